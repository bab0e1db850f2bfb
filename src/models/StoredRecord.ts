/** Raw shape of any document the store keeps in MongoDB. */
export interface StoredRecord {
  _id: string;
  _version: number;
  [field: string]: unknown;
}
