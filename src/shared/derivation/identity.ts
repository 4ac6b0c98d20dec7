import { createHash } from "crypto";

/** Namespace for mesh router identities. */
export const DEFAULT_IDENTITY_NAMESPACE = "zenoh_node";

/**
 * Stable 32-character hex fingerprint for a node.
 * MD5 is used for its fixed digest length, not for security.
 */
export function nodeIdentity(nodeId: string, namespace: string = DEFAULT_IDENTITY_NAMESPACE): string {
  return createHash("md5").update(`${namespace}_${nodeId}`, "utf8").digest("hex");
}
