import { IntegrityError, branchRef, hashCanonical } from "@patchdrop/auth";

import type { TopicId, UnsignedRecord } from "./record.js";

export const DROP_TOPIC: TopicId = hashCanonical("patchdrop/topic/drop");
export const SNAPSHOTS_TOPIC: TopicId = hashCanonical("patchdrop/topic/snapshots");
export const MIRRORS_TOPIC: TopicId = hashCanonical("patchdrop/topic/mirrors");

/** Merge points of one branch all thread onto this topic. */
export function mergeTopic(branch: string): TopicId {
  return hashCanonical(["patchdrop/topic/merges", branchRef(branch)]);
}

/**
 * Topic a record is pinned to by its message type, or null when the topic
 * follows from `in_reply_to`.
 */
export function wellKnownTopic(record: UnsignedRecord): TopicId | null {
  const { message } = record;
  switch (message.type) {
    case "drop-metadata":
      return DROP_TOPIC;
    case "mirrors":
      return MIRRORS_TOPIC;
    case "checkpoint": {
      if (message.kind === "snapshot") return SNAPSHOTS_TOPIC;
      const tips = record.header.patch?.tips ?? [];
      if (tips.length !== 1) throw new IntegrityError("merge point must announce exactly one branch tip");
      return mergeTopic(tips[0].name);
    }
    case "basic":
    case "code-comment":
      return null;
    default: {
      const _exhaustive: never = message;
      throw new IntegrityError(`unknown message type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
