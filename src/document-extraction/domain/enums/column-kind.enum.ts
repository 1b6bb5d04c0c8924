export enum ColumnKind {
  FIELD = 'field',
  TABLE = 'table',
}
