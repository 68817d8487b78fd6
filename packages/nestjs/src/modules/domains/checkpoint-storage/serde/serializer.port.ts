/**
 * Turns values into bytes and back. `loads` rejects with a `DecodeError` on a
 * payload it cannot read.
 */
export interface SerializerProtocol {
  dumps(value: unknown): Promise<Uint8Array>;
  loads(data: Uint8Array): Promise<unknown>;
}
