import { DecodeContractViolation } from "../errors";

// Schema Registry envelope: 0x00 + 4-byte schema ID (big-endian) + encoded body
export const MAGIC_BYTE = 0x00;
export const WIRE_HEADER_LENGTH = 5;

export interface FramedPayload {
  schemaId: number;
  body: Buffer;
}

export function unframe(value: Buffer): FramedPayload {
  if (value.length < WIRE_HEADER_LENGTH) {
    throw new DecodeContractViolation(
      `Malformed payload: ${value.length} byte(s) is shorter than the ${WIRE_HEADER_LENGTH}-byte schema registry header`,
    );
  }
  if (value[0] !== MAGIC_BYTE) {
    throw new DecodeContractViolation(
      `Malformed payload: unknown magic byte 0x${value[0].toString(16).padStart(2, "0")}`,
    );
  }

  return {
    schemaId: value.readUInt32BE(1),
    body: value.subarray(WIRE_HEADER_LENGTH),
  };
}

export function frame(schemaId: number, body: Buffer): Buffer {
  const header = Buffer.alloc(WIRE_HEADER_LENGTH);
  header.writeUInt8(MAGIC_BYTE, 0);
  header.writeUInt32BE(schemaId, 1);
  return Buffer.concat([header, body]);
}
