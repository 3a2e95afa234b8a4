import { createHash } from "crypto";
import type { FingerprintAlgorithm, StreamingHasher } from "./fingerprint.types";

export const SHA256_CODE_PREFIX = "SHA256:";

class Sha256Hasher implements StreamingHasher {
  private readonly hash = createHash("sha256");
  private finalized = false;

  update(chunk: Uint8Array): void {
    if (this.finalized) throw new Error("Hasher already finalized");
    this.hash.update(chunk);
  }

  finalize(): string {
    if (this.finalized) throw new Error("Hasher already finalized");
    this.finalized = true;
    return `${SHA256_CODE_PREFIX}${this.hash.digest("hex")}`;
  }
}

/**
 * Default algorithm. Its `SHA256:` codes are written under whatever namespace is
 * configured, including the default `org.iscc.omero.sum`, which names a
 * different code family; readers tell them apart by the code prefix and the
 * record's `algorithm` key. Deployments sharing a repository with ISCC
 * producers should set their own namespace.
 */
export const sha256Algorithm: FingerprintAlgorithm = {
  name: "sha256",
  version: "1.0",
  create: () => new Sha256Hasher()
};
