/**
 * Represents the schema for the 'events' collection.
 * `entityId` is the event's `id` on the wire; `id` is reserved by mongoose.
 */
export interface IEventRecord {
  token: number;
  type: string;
  op: string;
  entityId: string | null;
  data: unknown;
  createdAt: Date;
}
