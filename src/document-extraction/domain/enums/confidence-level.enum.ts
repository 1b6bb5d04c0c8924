export enum ConfidenceLevel {
  HIGH = 'High',
  LOW = 'Low',
}
