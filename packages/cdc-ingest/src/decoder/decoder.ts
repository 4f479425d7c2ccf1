import { Type, types } from "avsc";
import type { Logger } from "../commons";
import {
  CdcPipelineError,
  DecodeContractViolation,
  describeError,
  SchemaResolutionError,
} from "../errors";
import { normalizeOperation, type DecodedRecord } from "../model";
import { SchemaCache } from "./schemaCache";
import type { SchemaRegistryClient } from "./schemaRegistryClient";
import { unframe } from "./wireFormat";

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

type AvroSchemaInput = Parameters<typeof Type.forSchema>[0];

// Avro longs decode to bigint so int64 values above 2^53 stay exact
const bigintLongType = types.LongType.__with({
  fromBuffer: (buf: Buffer): bigint => buf.readBigInt64LE(),
  toBuffer: (value: bigint | number): Buffer => {
    const buf = Buffer.alloc(8);
    buf.writeBigInt64LE(BigInt(value));
    return buf;
  },
  fromJSON: (value: number | string): bigint => BigInt(value),
  toJSON: (value: bigint): string => value.toString(),
  isValid: (value: unknown): boolean =>
    typeof value === "bigint" ||
    (typeof value === "number" && Number.isSafeInteger(value)),
  compare: (a: bigint, b: bigint): number => (a === b ? 0 : a < b ? -1 : 1),
});

/**
 * Builds an Avro type whose `long` fields read and write as bigint.
 */
export const createAvroType = (schema: AvroSchemaInput): Type =>
  Type.forSchema(schema, { registry: { long: bigintLongType } });

export interface RecordDecoder {
  decode: (value: Buffer) => Promise<DecodedRecord>;
  close: () => void;
}

export interface SchemaRegistryDecoderOptions {
  registry: SchemaRegistryClient;
  logger: Logger;
  /** Shared between decoders of one process; defaults to a private cache */
  cache?: SchemaCache<Type>;
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isAvroSchema = (value: unknown): value is AvroSchemaInput =>
  isObject(value) && typeof value.type === "string";

const requirePresent = (
  fields: Record<string, unknown>,
  name: string,
): unknown => {
  const value = fields[name];
  if (value === undefined || value === null) {
    throw new DecodeContractViolation(`Required field '${name}' is missing`, {
      field: name,
    });
  }
  return value;
};

const requireString = (
  fields: Record<string, unknown>,
  name: string,
): string => {
  const value = requirePresent(fields, name);
  if (typeof value !== "string") {
    throw new DecodeContractViolation(
      `Field '${name}' must be a string, got ${typeof value}`,
      { field: name },
    );
  }
  return value;
};

const requireInt32 = (
  fields: Record<string, unknown>,
  name: string,
): number => {
  const value = requirePresent(fields, name);
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < INT32_MIN ||
    value > INT32_MAX
  ) {
    throw new DecodeContractViolation(
      `Field '${name}' must be a 32-bit integer, got ${String(value)}`,
      { field: name },
    );
  }
  return value;
};

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const requireInt64 = (
  fields: Record<string, unknown>,
  name: string,
): bigint => {
  const value = requirePresent(fields, name);
  const int64 =
    typeof value === "bigint" ? value
    : typeof value === "number" && Number.isSafeInteger(value) ? BigInt(value)
    : undefined;
  if (int64 === undefined || int64 < INT64_MIN || int64 > INT64_MAX) {
    throw new DecodeContractViolation(
      `Field '${name}' must be a 64-bit integer, got ${String(value)}`,
      { field: name },
    );
  }
  return int64;
};

/**
 * Checks a decoded Avro value against the change-record contract.
 * Either every required field is present and typed, or this throws.
 */
export function toDecodedRecord(
  schemaId: number,
  value: unknown,
): DecodedRecord {
  if (!isObject(value)) {
    throw new DecodeContractViolation(
      `Schema id ${schemaId} does not decode to a record`,
    );
  }

  const op = requireString(value, "__op");
  if (normalizeOperation(op) === undefined) {
    throw new DecodeContractViolation(`Unknown change operation '${op}'`, {
      field: "__op",
    });
  }
  const lsn = requireInt64(value, "__lsn");
  if (lsn < 0n) {
    throw new DecodeContractViolation(
      `Field '__lsn' must not be negative, got ${lsn}`,
      { field: "__lsn" },
    );
  }

  return {
    schemaId,
    id: requireInt32(value, "id"),
    first_name: requireString(value, "first_name"),
    last_name: requireString(value, "last_name"),
    email: requireString(value, "email"),
    __op: op,
    __source_ts_ms: requireInt64(value, "__source_ts_ms"),
    __lsn: lsn,
  };
}

/**
 * Decodes schema-registry framed Avro payloads into change records.
 *
 * Constructed once per worker setup and closed on teardown; the registry
 * client and the schema cache live as long as the decoder does.
 */
export class SchemaRegistryDecoder implements RecordDecoder {
  private readonly registry: SchemaRegistryClient;
  private readonly logger: Logger;
  private readonly cache: SchemaCache<Type>;
  private closed = false;

  constructor(options: SchemaRegistryDecoderOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.cache = options.cache ?? new SchemaCache<Type>();
  }

  async decode(value: Buffer): Promise<DecodedRecord> {
    if (this.closed) {
      throw new CdcPipelineError("Decoder is closed");
    }

    const { schemaId, body } = unframe(value);
    const type = await this.cache.getOrResolve(schemaId, (id) =>
      this.resolveType(id),
    );

    let decoded: unknown;
    try {
      decoded = type.fromBuffer(body);
    } catch (error) {
      throw new DecodeContractViolation(
        `Malformed Avro body for schema id ${schemaId}: ${describeError(error)}`,
        { cause: error },
      );
    }

    return toDecodedRecord(schemaId, decoded);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.registry.close();
    this.logger.log("Decoder closed");
  }

  private async resolveType(schemaId: number): Promise<Type> {
    const registered = await this.registry.getSchemaById(schemaId);
    if (registered.schemaType.toUpperCase() !== "AVRO") {
      throw new SchemaResolutionError(
        schemaId,
        `Schema id ${schemaId} has unsupported type ${registered.schemaType}`,
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(registered.schema);
    } catch (error) {
      throw new SchemaResolutionError(
        schemaId,
        `Schema id ${schemaId} is not valid JSON`,
        { cause: error },
      );
    }
    if (!isAvroSchema(parsed)) {
      throw new SchemaResolutionError(
        schemaId,
        `Schema id ${schemaId} is not an Avro schema object`,
      );
    }

    try {
      const type = createAvroType(parsed);
      this.logger.log(`Resolved schema id ${schemaId} (${type.name ?? "anonymous"})`);
      return type;
    } catch (error) {
      throw new SchemaResolutionError(
        schemaId,
        `Schema id ${schemaId} is not a valid Avro schema: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}
