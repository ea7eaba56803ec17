export interface LogEntry {
  request_id: string;
  /** ISO-8601 UTC time the request was handled */
  timestamp: string;
  endpoint: string;
  request: unknown;
  response: unknown;
}

/**
 * Append-only document store. Keys are relative to the store's container.
 */
export interface LogStore {
  put(key: string, document: string): Promise<void>;
  ping(): Promise<boolean>;
}
