import { expect } from "chai";
import {
  createAvroType,
  SchemaRegistryDecoder,
  toDecodedRecord,
} from "../src/decoder/decoder";
import { SchemaRegistryClient } from "../src/decoder/schemaRegistryClient";
import { frame } from "../src/decoder/wireFormat";
import {
  CdcPipelineError,
  DecodeContractViolation,
  SchemaResolutionError,
} from "../src/errors";
import {
  createCapturingLogger,
  createFakeRegistry,
  customer,
  CUSTOMER_SCHEMA,
  CUSTOMER_SCHEMA_WITHOUT_EMAIL,
  encodeFramed,
  expectRejection,
  NO_WAIT_RETRY,
  type FakeRegistry,
} from "./helpers";

describe("SchemaRegistryDecoder", () => {
  let registry: FakeRegistry;
  let decoder: SchemaRegistryDecoder;

  beforeEach(() => {
    registry = createFakeRegistry({
      1: CUSTOMER_SCHEMA,
      2: CUSTOMER_SCHEMA_WITHOUT_EMAIL,
    });
    const logger = createCapturingLogger();
    decoder = new SchemaRegistryDecoder({
      registry: new SchemaRegistryClient({
        url: "http://registry.test",
        logger,
        fetch: registry.fetch,
        retryPolicy: NO_WAIT_RETRY,
      }),
      logger,
    });
  });

  afterEach(() => {
    decoder.close();
  });

  it("should decode a framed Avro record into a change record", async () => {
    const record = await decoder.decode(
      encodeFramed(1, CUSTOMER_SCHEMA, customer({ id: 1004, __lsn: 33 })),
    );

    expect(record).to.deep.equal({
      schemaId: 1,
      id: 1004,
      first_name: "Sally",
      last_name: "Thomas",
      email: "sally.thomas@example.test",
      __op: "c",
      __source_ts_ms: 1700000000000n,
      __lsn: 33n,
    });
  });

  it("should keep 64-bit values above 2^53 exact", async () => {
    const record = await decoder.decode(
      encodeFramed(
        1,
        CUSTOMER_SCHEMA,
        customer({
          __lsn: 9007199254740993n,
          __source_ts_ms: 9223372036854775807n,
        }),
      ),
    );

    expect(record.__lsn).to.equal(9007199254740993n);
    expect(record.__source_ts_ms).to.equal(9223372036854775807n);
  });

  it("should ask the registry once per schema id", async () => {
    const value = encodeFramed(1, CUSTOMER_SCHEMA, customer());

    await decoder.decode(value);
    await decoder.decode(value);

    expect(registry.urls).to.deep.equal(["http://registry.test/schemas/ids/1"]);
  });

  it("should share one registry request between concurrent decodes", async () => {
    const values = [1, 2, 3, 4].map((id) =>
      encodeFramed(1, CUSTOMER_SCHEMA, customer({ id })),
    );

    const records = await Promise.all(values.map((v) => decoder.decode(v)));

    expect(records.map((r) => r.id)).to.deep.equal([1, 2, 3, 4]);
    expect(registry.urls).to.have.lengthOf(1);
  });

  it("should reject a record whose schema has no email field", async () => {
    const value = encodeFramed(2, CUSTOMER_SCHEMA_WITHOUT_EMAIL, customer());

    const error = await expectRejection(
      decoder.decode(value),
      DecodeContractViolation,
    );

    expect(error.message).to.equal("Required field 'email' is missing");
    expect(error).to.have.property("field", "email");
  });

  it("should reject a null value for a required field", async () => {
    const value = encodeFramed(1, CUSTOMER_SCHEMA, customer({ email: null }));

    const error = await expectRejection(
      decoder.decode(value),
      DecodeContractViolation,
    );

    expect(error.message).to.equal("Required field 'email' is missing");
  });

  it("should raise SchemaResolutionError for an unregistered schema id", async () => {
    const value = encodeFramed(42, CUSTOMER_SCHEMA, customer());

    const error = await expectRejection(
      decoder.decode(value),
      SchemaResolutionError,
    );

    expect(error).to.have.property("schemaId", 42);
  });

  it("should reject trailing bytes after the Avro body", async () => {
    const body = createAvroType(CUSTOMER_SCHEMA).toBuffer(customer());
    const value = frame(1, Buffer.concat([body, Buffer.from([0])]));

    const error = await expectRejection(
      decoder.decode(value),
      DecodeContractViolation,
    );

    expect(error.message).to.match(/^Malformed Avro body for schema id 1: /);
  });

  it("should reject an unknown change operation", async () => {
    const value = encodeFramed(1, CUSTOMER_SCHEMA, customer({ __op: "x" }));

    const error = await expectRejection(
      decoder.decode(value),
      DecodeContractViolation,
    );

    expect(error.message).to.equal("Unknown change operation 'x'");
  });

  it("should refuse to decode after close", async () => {
    decoder.close();

    const error = await expectRejection(
      decoder.decode(encodeFramed(1, CUSTOMER_SCHEMA, customer())),
      CdcPipelineError,
    );

    expect(error.message).to.equal("Decoder is closed");
  });
});

describe("toDecodedRecord", () => {
  const fields = {
    id: 1,
    first_name: "Anne",
    last_name: "Kretchmar",
    email: "annek@example.test",
    __op: "u",
    __source_ts_ms: 5,
    __lsn: 6,
  };

  it("should accept a complete record", () => {
    expect(toDecodedRecord(3, fields)).to.deep.equal({
      schemaId: 3,
      ...fields,
      __source_ts_ms: 5n,
      __lsn: 6n,
    });
  });

  it("should reject a value outside the 64-bit range", () => {
    expect(() =>
      toDecodedRecord(3, { ...fields, __lsn: 2n ** 63n }),
    ).to.throw(
      DecodeContractViolation,
      "Field '__lsn' must be a 64-bit integer, got 9223372036854775808",
    );
  });

  it("should reject an id outside the 32-bit range", () => {
    expect(() => toDecodedRecord(3, { ...fields, id: 2147483648 })).to.throw(
      DecodeContractViolation,
      "Field 'id' must be a 32-bit integer, got 2147483648",
    );
  });

  it("should reject a mistyped string field", () => {
    expect(() => toDecodedRecord(3, { ...fields, last_name: 12 })).to.throw(
      DecodeContractViolation,
      "Field 'last_name' must be a string, got number",
    );
  });

  it("should reject a negative log sequence number", () => {
    expect(() => toDecodedRecord(3, { ...fields, __lsn: -1 })).to.throw(
      DecodeContractViolation,
      "Field '__lsn' must not be negative, got -1",
    );
  });

  it("should reject a value that is not a record", () => {
    expect(() => toDecodedRecord(3, "text")).to.throw(
      DecodeContractViolation,
      "Schema id 3 does not decode to a record",
    );
  });
});
