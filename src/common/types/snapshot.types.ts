export interface SnapshotEntry {
  number: number;
  timestamp: string;
  comment: string;
}
