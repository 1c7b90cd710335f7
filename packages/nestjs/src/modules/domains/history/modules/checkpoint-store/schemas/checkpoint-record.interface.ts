export interface CheckpointTrackingMetadata {
  runId?: string;
  sessionId?: string;
  userId?: string;
}

export interface CheckpointRecord {
  threadId: string;

  /**
   * The checkpoint id. Ids are time-ordered, so comparing them as strings
   * gives production order.
   */
  sequenceKey: string;

  /**
   * Channel values at the time of the checkpoint.
   */
  snapshot: Record<string, unknown>;

  /**
   * Writes made since the previous checkpoint, keyed by writer stage.
   */
  deltaWrites: Record<string, unknown>;

  metadata: CheckpointTrackingMetadata;
}
