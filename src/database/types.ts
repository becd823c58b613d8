export type DatabaseConfig = {
  type: 'sqlite'
  sqlitePath: string
}

export type SqlParam = string | number | null

export type QueryResult<T> = {
  rows: T[]
  rowCount: number
}

export type DatabaseConnection = {
  query: <T = Record<string, unknown>>(sql: string, params?: SqlParam[]) => Promise<QueryResult<T>>
  transaction: <T>(fn: (tx: DatabaseConnection) => Promise<T>) => Promise<T>
  close: () => Promise<void>
}

export type Database = DatabaseConnection & {
  migrate: () => Promise<void>
}
