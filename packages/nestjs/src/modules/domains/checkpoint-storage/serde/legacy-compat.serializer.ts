import { Logger } from "@nestjs/common";

import { GraphJsonSerializer } from "./graph-json.serializer";
import { isLegacyPayload, PickleDecoder } from "./pickle.decoder";
import type { SerializerProtocol } from "./serializer.port";

export interface LegacyDecoder {
  decode(data: Uint8Array): unknown;
}

/**
 * Serializer that can still read checkpoints written in the legacy binary
 * pickle layout.
 *
 * Payloads that start with `0x80` and end with `0x2E` are handed to the legacy
 * decoder first; when it cannot read them the primary codec gets a try, and if
 * that fails too the legacy decoder's error is raised. All other payloads, and
 * every write, go through the primary codec.
 *
 * @example
 * const serde = new LegacyCompatSerializer();
 * await serde.loads(new TextEncoder().encode('{"key":"value"}')); // { key: "value" }
 */
export class LegacyCompatSerializer implements SerializerProtocol {
  private readonly logger = new Logger(LegacyCompatSerializer.name);

  constructor(
    private readonly primary: SerializerProtocol = new GraphJsonSerializer(),
    private readonly legacy: LegacyDecoder = new PickleDecoder(),
  ) {}

  dumps(value: unknown): Promise<Uint8Array> {
    return this.primary.dumps(value);
  }

  async loads(data: Uint8Array): Promise<unknown> {
    if (!isLegacyPayload(data)) {
      return this.primary.loads(data);
    }

    this.logger.verbose(`Reading ${data.length} byte legacy payload`);
    try {
      return this.legacy.decode(data);
    } catch (legacyError) {
      try {
        return await this.primary.loads(data);
      } catch {
        throw legacyError;
      }
    }
  }
}
