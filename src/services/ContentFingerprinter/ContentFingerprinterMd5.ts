import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";

import { fingerprintPrefixBytes } from "@/constants";

import type { ContentFingerprinter } from "./ContentFingerprinter";

export class ContentFingerprinterMd5 implements ContentFingerprinter {
  constructor(private readonly prefixBytes = fingerprintPrefixBytes) {}

  async fingerprint(filePath: string) {
    const hash = createHash("md5");
    const stream = createReadStream(filePath, {
      start: 0,
      end: this.prefixBytes - 1,
    });
    for await (const chunk of stream) {
      hash.update(chunk);
    }
    return hash.digest("hex");
  }

  async sameContent(a: string, b: string) {
    const [statA, statB] = await Promise.all([stat(a), stat(b)]);
    if (statA.size !== statB.size) return false;
    const [hashA, hashB] = await Promise.all([
      this.fingerprint(a),
      this.fingerprint(b),
    ]);
    return hashA === hashB;
  }
}
