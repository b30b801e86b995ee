import { createHash } from "crypto";

export interface IncrementalHash {
  update(chunk: Uint8Array): void;
  digest(): string;
}

export function createSha256(): IncrementalHash {
  const hash = createHash("sha256");
  return {
    update(chunk) {
      hash.update(chunk);
    },
    digest() {
      return hash.digest("hex");
    }
  };
}
