import { isRecord, optionalString } from "../../../../../../common/utils/record.utils";
import type { CheckpointRecord } from "./checkpoint-record.interface";

export const compareSequenceKeys = (
  a: CheckpointRecord,
  b: CheckpointRecord,
): number =>
  a.sequenceKey < b.sequenceKey ? -1 : a.sequenceKey > b.sequenceKey ? 1 : 0;

/**
 * Maps a stored checkpoint (its channel values and metadata, as LangGraph
 * savers keep them) onto a `CheckpointRecord`.
 */
export const toCheckpointRecord = (
  threadId: string,
  checkpointId: string,
  channelValues: unknown,
  metadata: unknown,
): CheckpointRecord => {
  const meta = isRecord(metadata) ? metadata : {};

  return {
    threadId,
    sequenceKey: checkpointId,
    snapshot: isRecord(channelValues) ? channelValues : {},
    deltaWrites: isRecord(meta.writes) ? meta.writes : {},
    metadata: {
      runId: optionalString(meta.run_id),
      sessionId: optionalString(meta.session_id),
      userId: optionalString(meta.user_id),
    },
  };
};
