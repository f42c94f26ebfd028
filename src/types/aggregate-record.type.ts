export interface AggregateRecord {
  count: number;
  sum: number;
}
