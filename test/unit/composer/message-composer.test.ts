import { afterEach, describe, expect, test, vi } from "vitest";
import { DEFAULT_COMPOSER_CONFIG, parseComposerConfig } from "../../../src/config";
import { createMessageComposer, repeatRange, type ComposeResult } from "../../../src/composer/message-composer";
import type {
  SchemaProvider,
  SegmentOccurrence,
  SegmentSchema,
  TriggerEventDefinition,
} from "../../../src/hl7v2/schema/types";
import { defaultResolvers } from "../../../src/resolvers";
import type { FieldValueResolver } from "../../../src/resolvers/types";
import { field, REFERENCE_TIME, testBundle } from "../helpers";

function occurrence(
  code: string,
  level: number,
  optionality: SegmentOccurrence["optionality"],
  repeatability: SegmentOccurrence["repeatability"] = "once",
  isGroup = false,
): Omit<SegmentOccurrence, "position"> {
  return { code, level, optionality, repeatability, isGroup };
}

const triggerEvent: TriggerEventDefinition = {
  code: "zzz_t01",
  structure: "ZZZ_T01",
  segments: [
    occurrence("MSH", 0, "required"),
    occurrence("EVN", 0, "required"),
    occurrence("PID", 0, "required"),
    occurrence("NK1", 0, "optional", "unbounded"),
    occurrence("ORDER", 0, "optional", "once", true),
    occurrence("ORC", 1, "required"),
    occurrence("OBX", 1, "optional", "unbounded"),
    occurrence("NOTES", 1, "optional", "once", true),
    occurrence("NTE", 2, "required"),
    occurrence("ROL", 0, "required"),
  ].map((entry, index) => ({ ...entry, position: index + 1 })),
};

function segment(code: string, longName: string, fields: SegmentSchema["fields"]): SegmentSchema {
  return { code, longName, description: null, fields };
}

const segments: SegmentSchema[] = [
  segment("MSH", "Message Header", [
    field(1, "Field Separator", "ST"),
    field(2, "Encoding Characters", "ST"),
    field(13, "Sequence Number", "NM"),
  ]),
  segment("EVN", "Event Type", [field(2, "Recorded Date/Time", "TS")]),
  segment("PID", "Patient Identification", [field(1, "Set ID - PID", "SI"), field(2, "Patient ID", "ST")]),
  segment("NK1", "Next of Kin / Associated Parties", [field(1, "Set ID - NK1", "SI")]),
  segment("ORC", "Common Order", [field(1, "Order Control", "ID")]),
  segment("OBX", "Observation/Result", [field(1, "Set ID - OBX", "SI")]),
  segment("NTE", "Notes and Comments", [field(1, "Set ID - NTE", "SI")]),
];

function fakeProvider(): SchemaProvider {
  return {
    getTriggerEvent: async (code) => (code === triggerEvent.code ? triggerEvent : null),
    getSegment: async (code) => segments.find((s) => s.code === code) ?? null,
    getDataType: async (code) => ({ code, components: [] }),
    getCodeTable: async () => null,
    listTriggerEvents: async () => [triggerEvent.code],
  };
}

const composer = createMessageComposer({ provider: fakeProvider(), config: DEFAULT_COMPOSER_CONFIG });

function messageOf(result: ComposeResult): string {
  if (!("message" in result)) throw new Error(`Composition failed: ${result.error}`);
  return result.message;
}

function lines(result: ComposeResult): string[] {
  return messageOf(result).split("\r");
}

function codes(result: ComposeResult): string[] {
  return lines(result).map((line) => line.split("|")[0] ?? "");
}

const everything = { NK1: 1, ORDER: 1, OBX: 1, NOTES: 1 };

afterEach(() => {
  vi.restoreAllMocks();
});

describe("MessageComposer.compose", () => {
  test("with every optional segment excluded only the required lines remain", async () => {
    const result = await composer.compose("ZZZ^T01", testBundle, {
      seed: 1,
      segmentInclusionProbabilities: { NK1: 0, ORDER: 0 },
    });
    expect(codes(result)).toEqual(["MSH", "EVN", "PID", "ROL"]);
  });

  test("a segment without a schema is emitted as its code", async () => {
    const result = await composer.compose("ZZZ^T01", testBundle, { seed: 1 });
    expect(lines(result).at(-1)).toBe("ROL");
  });

  test("included groups emit their members and repeat counts are honored", async () => {
    const result = await composer.compose("ZZZ^T01", testBundle, {
      seed: 1,
      segmentInclusionProbabilities: everything,
      segmentRepeatCounts: { NK1: 2, OBX: 3 },
    });
    expect(codes(result)).toEqual(["MSH", "EVN", "PID", "NK1", "NK1", "ORC", "OBX", "OBX", "OBX", "NTE", "ROL"]);
    expect(lines(result).filter((line) => line.startsWith("OBX"))).toEqual(["OBX|1", "OBX|2", "OBX|3"]);
  });

  test("an excluded group skips its members and nested groups", async () => {
    const result = await composer.compose("ZZZ^T01", testBundle, {
      seed: 1,
      segmentInclusionProbabilities: { ...everything, ORDER: 0 },
    });
    expect(codes(result)).not.toContain("ORC");
    expect(codes(result)).not.toContain("NTE");
    expect(codes(result).at(-1)).toBe("ROL");
  });

  test("an excluded nested group leaves its parent group's other members", async () => {
    const result = await composer.compose("ZZZ^T01", testBundle, {
      seed: 1,
      segmentInclusionProbabilities: { NK1: 0, ORDER: 1, OBX: 0, NOTES: 0 },
    });
    expect(codes(result)).toEqual(["MSH", "EVN", "PID", "ORC", "ROL"]);
  });

  test("a repeat count of zero still emits one occurrence", async () => {
    const result = await composer.compose("ZZZ^T01", testBundle, {
      seed: 1,
      segmentInclusionProbabilities: { NK1: 1, ORDER: 0 },
      segmentRepeatCounts: { NK1: 0 },
    });
    expect(codes(result).filter((code) => code === "NK1")).toHaveLength(1);
  });

  test("optional segments are included about 60% of the time", async () => {
    let included = 0;
    const runs = 300;
    for (let seed = 0; seed < runs; seed++) {
      const result = await composer.compose("ZZZ^T01", testBundle, { seed, segmentInclusionProbabilities: { ORDER: 0 } });
      if (codes(result).includes("NK1")) included++;
    }
    expect(included / runs).toBeGreaterThanOrEqual(0.5);
    expect(included / runs).toBeLessThanOrEqual(0.7);
  });

  test("default repeat counts stay within the range for the segment", async () => {
    for (let seed = 0; seed < 50; seed++) {
      const result = await composer.compose("ZZZ^T01", testBundle, { seed, segmentInclusionProbabilities: everything });
      const count = (code: string) => codes(result).filter((c) => c === code).length;
      expect(count("NK1")).toBeGreaterThanOrEqual(1);
      expect(count("NK1")).toBeLessThanOrEqual(2);
      expect(count("OBX")).toBeGreaterThanOrEqual(1);
      expect(count("OBX")).toBeLessThanOrEqual(5);
    }
  });

  test("the same seed composes the same message", async () => {
    const first = await composer.compose("ZZZ^T01", testBundle, { seed: 42 });
    const second = await composer.compose("ZZZ^T01", testBundle, { seed: 42 });
    expect(messageOf(second)).toBe(messageOf(first));
  });

  test("the header names the message structure and the event follows the encounter", async () => {
    const result = await composer.compose("ZZZ^T01", testBundle, { seed: 3, referenceTime: REFERENCE_TIME });
    const [msh = "", evn = ""] = lines(result);
    const header = msh.split("|");

    expect(header[8]).toBe("ZZZ^T01^ZZZ_T01");
    expect(header[9]).toMatch(/^\d{6}$/);
    expect(header[12]).toBe("1");
    expect(evn).toBe("EVN||20240115083000");
    const timestamp = header[6] ?? "";
    expect(timestamp >= "20240115083000" && timestamp <= "20240115093000").toBe(true);
  });

  test("an unknown trigger event is a failure naming its code", async () => {
    expect(await composer.compose("ZZZ^Z99", testBundle, { seed: 1 })).toEqual({
      error: "Trigger event zzz_z99 not found",
      triggerEvent: "zzz_z99",
    });
  });

  test("invalid options are a failure", async () => {
    const result = await composer.compose("ZZZ^T01", testBundle, { seed: "one" });
    expect(result).toEqual({
      error: "Invalid generation options: seed: Expected number, received string",
      triggerEvent: "zzz_t01",
    });
  });

  test("a failing segment is logged and skipped", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const failing: FieldValueResolver = {
      name: "failing",
      priority: 200,
      canHandle: (ctx) => ctx.segmentCode === "PID",
      resolve: () => {
        throw new Error("boom");
      },
    };
    const custom = createMessageComposer({
      provider: fakeProvider(),
      config: DEFAULT_COMPOSER_CONFIG,
      resolvers: [failing, ...defaultResolvers()],
    });

    const result = await custom.compose("ZZZ^T01", testBundle, {
      seed: 1,
      segmentInclusionProbabilities: { NK1: 0, ORDER: 0 },
    });
    expect(codes(result)).toEqual(["MSH", "EVN", "ROL"]);
    expect(warn).toHaveBeenCalledWith("[composer] Skipping PID segment: boom");
  });

  test("a failing message header fails the composition", async () => {
    const failing: FieldValueResolver = {
      name: "failing",
      priority: 200,
      canHandle: (ctx) => ctx.segmentCode === "MSH",
      resolve: () => {
        throw new Error("no header");
      },
    };
    const custom = createMessageComposer({
      provider: fakeProvider(),
      config: DEFAULT_COMPOSER_CONFIG,
      resolvers: [failing, ...defaultResolvers()],
    });

    expect(await custom.compose("ZZZ^T01", testBundle, { seed: 1 })).toEqual({
      error: "Message header generation failed: no header",
      triggerEvent: "zzz_t01",
    });
  });

  test("a provider failing to load segments is a failure result", async () => {
    const offline = createMessageComposer({
      provider: {
        ...fakeProvider(),
        getSegment: async () => {
          throw new Error("segment store offline");
        },
      },
      config: DEFAULT_COMPOSER_CONFIG,
    });

    await expect(offline.compose("ZZZ^T01", testBundle, { seed: 1 })).resolves.toEqual({
      error: "Error composing message: segment store offline",
      triggerEvent: "zzz_t01",
    });
  });

  test("a provider failing to find trigger events is a failure result", async () => {
    const offline = createMessageComposer({
      provider: {
        ...fakeProvider(),
        getTriggerEvent: async () => {
          throw new Error("catalog unavailable");
        },
      },
      config: DEFAULT_COMPOSER_CONFIG,
    });

    await expect(offline.compose("ZZZ^T01", testBundle, { seed: 1 })).resolves.toEqual({
      error: "Error composing message: catalog unavailable",
      triggerEvent: "zzz_t01",
    });
  });

  test("segments are joined with the configured separator", async () => {
    const custom = createMessageComposer({
      provider: fakeProvider(),
      config: parseComposerConfig({ segmentSeparator: "\n" }),
    });
    const message = messageOf(await custom.compose("ZZZ^T01", testBundle, { seed: 1 }));
    expect(message).not.toContain("\r");
    expect(message.split("\n")[0]?.startsWith("MSH|")).toBe(true);
  });

  test("pinned values flow into the message", async () => {
    const result = await composer.compose("ZZZ^T01", testBundle, {
      seed: 1,
      lockedValues: { "PID.2": "PINNED-1", "message.controlId": "CTRL-9" },
    });
    const [msh = "", , pid = ""] = lines(result);
    expect(msh.split("|")[9]).toBe("CTRL-9");
    expect(pid).toBe("PID|1|PINNED-1");
  });
});

describe("MessageComposer", () => {
  test("lists the provider's trigger events", async () => {
    expect(await composer.listTriggerEvents()).toEqual(["zzz_t01"]);
  });

  test("names its resolvers in priority order", () => {
    const names = composer.resolverNames();
    expect(names.field[0]).toBe("session-value (100)");
    expect(names.field.at(-1)).toBe("primitive-fallback (10)");
    expect(names.composite).toContain("coded-element (82)");
  });
});

describe("repeatRange", () => {
  test("is keyed by the segment's long name", () => {
    expect(repeatRange(segments[5] ?? null)).toEqual({ min: 1, max: 5 });
    expect(repeatRange(segments[3] ?? null)).toEqual({ min: 1, max: 2 });
  });

  test("matches the description too", () => {
    const dg1: SegmentSchema = { code: "DG1", longName: null, description: "Patient diagnosis information", fields: [] };
    expect(repeatRange(dg1)).toEqual({ min: 1, max: 3 });
  });

  test("unknown segments repeat once or twice", () => {
    expect(repeatRange(null)).toEqual({ min: 1, max: 2 });
  });
});
