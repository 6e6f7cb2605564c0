import { describe, expect, test } from "vitest";
import { parseComposerConfig } from "../../../src/config";
import type { GenerationContext } from "../../../src/composer/generation-context";
import { generateSegment, messageTypeField } from "../../../src/composer/segment-generator";
import type { SegmentSchema } from "../../../src/hl7v2/schema/types";
import { defaultResolvers } from "../../../src/resolvers";
import { ResolverChain } from "../../../src/resolvers/resolver-chain";
import type { FieldValueResolver } from "../../../src/resolvers/types";
import { field, fixedRandom, REFERENCE_TIME, testGeneration } from "../helpers";

const echo: FieldValueResolver = {
  name: "echo",
  priority: 1,
  canHandle: () => true,
  resolve: (ctx) => ctx.field.name,
};
const echoChain = new ResolverChain([echo]);

const msh: SegmentSchema = {
  code: "MSH",
  longName: "Message Header",
  description: null,
  fields: [
    field(1, "Field Separator", "ST"),
    field(2, "Encoding Characters", "ST"),
    field(9, "Message Type", "MSG"),
    field(13, "Sequence Number", "NM"),
  ],
};

const HEADER = "MSH|^~\\&|COMPOSER|COMPOSER_FACILITY|TARGET_APP|TARGET_FACILITY|20240115083000||ADT^A01^ADT_A01|123456|P|2.5";

function generate(
  schema: SegmentSchema | null,
  code: string,
  generation: GenerationContext = testGeneration({ random: fixedRandom() }),
  chain: ResolverChain = echoChain,
): string {
  return generateSegment(schema, code, { generation, chain, segmentIndex: 1 });
}

describe("messageTypeField", () => {
  test("appends the message structure to code and trigger event", () => {
    expect(messageTypeField("ADT^A01", "ADT_A01")).toBe("ADT^A01^ADT_A01");
  });

  test("keeps a message type that already names its structure", () => {
    expect(messageTypeField("ADT^A04^ADT_A01", "ADT_A04")).toBe("ADT^A04^ADT_A01");
  });
});

describe("generateSegment", () => {
  test("a segment without a schema is its bare code", () => {
    expect(generate(null, "ROL")).toBe("ROL");
  });

  test("fields are emitted by position and gaps are empty", () => {
    const pid: SegmentSchema = {
      code: "PID",
      longName: "Patient Identification",
      description: null,
      fields: [field(3, "Third", "ST"), field(1, "First", "ST")],
    };
    expect(generate(pid, "PID")).toBe("PID|First||Third");
  });

  describe("MSH", () => {
    test("header positions come from configuration and the temporal tracker", () => {
      expect(generate(msh, "MSH")).toBe(`${HEADER}|Sequence Number`);
    });

    test("runs to the version id even when the schema is shorter", () => {
      const short: SegmentSchema = { ...msh, fields: msh.fields.slice(0, 2) };
      expect(generate(short, "MSH")).toBe(HEADER);
    });

    test("configured values keep their components and escape each one", () => {
      const config = parseComposerConfig({
        messageHeader: { sendingApplication: "APP^^L", sendingFacility: "R&D|LAB" },
      });
      const generation = testGeneration({ config, random: fixedRandom() });
      const fields = generate(msh, "MSH", generation).split("|");
      expect(fields[2]).toBe("APP^^L");
      expect(fields[3]).toBe("R\\T\\D\\F\\LAB");
    });

    test("pinned header values are emitted verbatim", () => {
      const generation = testGeneration({
        options: { seed: 1, referenceTime: REFERENCE_TIME, lockedValues: { "message.controlId": "CTRL-1", "MSH.8": "SEC" } },
        random: fixedRandom(),
      });
      const fields = generate(msh, "MSH", generation).split("|");
      expect(fields[7]).toBe("SEC");
      expect(fields[9]).toBe("CTRL-1");
    });

    test("the message timestamp follows EVN-2 when it is already recorded", () => {
      const generation = testGeneration({ random: fixedRandom() });
      generation.timestamps.record("EVN.2", new Date("2024-01-14T22:15:00Z"));
      expect(generate(msh, "MSH", generation).split("|")[6]).toBe("20240114221500");
    });
  });

  test("EVN with the default resolvers", () => {
    const evn: SegmentSchema = {
      code: "EVN",
      longName: "Event Type",
      description: null,
      fields: [field(1, "Event Type Code", "ID", { table: "0003" }), field(2, "Recorded Date/Time", "TS")],
    };
    const chain = new ResolverChain(defaultResolvers());
    expect(generate(evn, "EVN", testGeneration({ random: fixedRandom() }), chain)).toBe("EVN|A01|20240115083000");
  });
});
