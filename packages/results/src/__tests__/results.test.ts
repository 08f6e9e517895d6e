import { describe, expect, it } from "vitest";
import {
  ArrayElementDecodeError,
  DecodeError,
  UnknownDiscriminatorError,
  createLogger,
  defineType,
  shapes,
  typeMetadata,
  type Codable,
} from "@polycodec/codec";
import {
  AnswerTypeInterface,
  ResultDataInterface,
  createAssessmentResult,
  createResult,
  createResultContext,
  exampleAssessment,
  readResultFields,
  resultObjectEntry,
  resultDataMetadata,
  standardAnswerTypeEntries,
  standardResultEntries,
  writeResultFields,
  type AnswerResult,
  type ResultData,
} from "../index.js";

const start = new Date("2017-10-17T05:28:09.000Z");

describe("result examples", () => {
  const context = createResultContext();

  for (const entry of standardResultEntries) {
    const examples = entry.metadata?.examples?.() ?? [];

    it(`round-trips every ${entry.discriminator} example`, () => {
      expect(examples.length).toBeGreaterThan(0);
      for (const example of examples) {
        const text = context.stringify(context.encodePolymorphic(ResultDataInterface, example));
        expect(context.decodePolymorphic(ResultDataInterface, text)).toEqual(example);
      }
    });
  }

  for (const entry of standardAnswerTypeEntries) {
    it(`round-trips the ${entry.discriminator} answer type`, () => {
      const encoded = context.encodePolymorphic(AnswerTypeInterface, entry.prototype);
      const text = context.stringify(encoded);
      expect(context.decodePolymorphic(AnswerTypeInterface, text)).toEqual(entry.prototype);
    });
  }
});

describe("result encoding", () => {
  const context = createResultContext();

  it("writes shared members first and the type last", () => {
    const result = createResult("step1", start, new Date("2017-10-17T05:33:09.000Z"));
    expect(context.stringify(context.encodePolymorphic(ResultDataInterface, result))).toBe(
      '{"identifier":"step1","startDate":"2017-10-17T05:28:09.000Z","endDate":"2017-10-17T05:33:09.000Z","type":"base"}'
    );
  });

  it("orders assessment members by level", () => {
    const encoded = context.encodePolymorphic(ResultDataInterface, exampleAssessment());
    expect([...encoded.members.keys()]).toEqual([
      "identifier",
      "startDate",
      "endDate",
      "stepHistory",
      "asyncResults",
      "path",
      "assessmentIdentifier",
      "versionString",
      "schemaIdentifier",
      "taskRunUUID",
      "$schema",
      "type",
    ]);
  });

  it("writes the answer type discriminator first", () => {
    const answer: AnswerResult = {
      type: "answer",
      identifier: "favorites",
      startDate: start,
      answerType: { type: "array", baseType: "integer", sequenceSeparator: "," },
      value: {
        kind: "array",
        items: [
          { kind: "integer", value: 1 },
          { kind: "integer", value: 5 },
        ],
      },
    };
    expect(context.stringify(context.encodePolymorphic(ResultDataInterface, answer))).toBe(
      '{"identifier":"favorites","startDate":"2017-10-17T05:28:09.000Z",' +
        '"answerType":{"type":"array","baseType":"integer","sequenceSeparator":","},' +
        '"value":"1,5","type":"answer"}'
    );
  });

  it("always writes the navigation path", () => {
    const assessment = createAssessmentResult("run", { startDate: start, taskRunUUID: "test-run" });
    expect(context.stringify(context.encodePolymorphic(ResultDataInterface, assessment))).toBe(
      '{"identifier":"run","startDate":"2017-10-17T05:28:09.000Z","stepHistory":[],"path":[],' +
        '"taskRunUUID":"test-run","type":"assessment"}'
    );
  });

  it("gives each new assessment its own run identifier", () => {
    const a = createAssessmentResult("run");
    const b = createAssessmentResult("run");
    expect(a.taskRunUUID).toMatch(/^[0-9a-f-]{36}$/);
    expect(a.taskRunUUID).not.toBe(b.taskRunUUID);
  });
});

describe("result decoding", () => {
  const context = createResultContext();

  it("normalizes answer values through the answer type", () => {
    const answer = context.decodePolymorphic(
      ResultDataInterface,
      '{"type":"answer","identifier":"age","startDate":"2017-10-17T05:28:09Z","answerType":{"type":"integer"},"value":"12"}'
    );
    expect(answer).toEqual({
      type: "answer",
      identifier: "age",
      startDate: start,
      answerType: { type: "integer" },
      value: { kind: "integer", value: 12 },
    });
  });

  it("defaults a missing path to empty", () => {
    const section = context.decodePolymorphic(
      ResultDataInterface,
      '{"type":"section","identifier":"s","startDate":"2017-10-17T05:28:09Z","stepHistory":[]}'
    );
    expect(section).toEqual({
      type: "section",
      identifier: "s",
      startDate: start,
      stepHistory: [],
      path: [],
    });
  });

  it("rejects an unregistered result type", () => {
    try {
      context.decodePolymorphic(
        ResultDataInterface,
        '{"type":"survey","identifier":"x","startDate":"2017-10-17T05:28:09Z"}'
      );
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownDiscriminatorError);
      if (error instanceof UnknownDiscriminatorError) {
        expect(error.discriminator).toBe("survey");
        expect(error.interfaceName).toBe("ResultData");
      }
    }
  });

  it("reports the failing child of a collection", () => {
    try {
      context.decodePolymorphic(
        ResultDataInterface,
        '{"type":"collection","identifier":"c","startDate":"2017-10-17T05:28:09Z","children":[' +
          '{"type":"base","identifier":"a","startDate":"2017-10-17T05:28:09Z"},' +
          '{"type":"base","identifier":"b"}]}'
      );
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ArrayElementDecodeError);
      if (error instanceof ArrayElementDecodeError) {
        expect(error.index).toBe(1);
        expect(error.inner.message).toBe('children[1].startDate: missing required member "startDate"');
      }
    }
  });

  it("rejects a path marker with an unknown direction", () => {
    expect(() =>
      context.decodePolymorphic(
        ResultDataInterface,
        '{"type":"section","identifier":"s","startDate":"2017-10-17T05:28:09Z","stepHistory":[],' +
          '"path":[{"identifier":"a","direction":"sideways"}]}'
      )
    ).toThrow('path[0].direction: expected one of forward, backward, exit, found "sideways"');
  });

  it("rejects an answer value of the wrong type", () => {
    try {
      context.decodePolymorphic(
        ResultDataInterface,
        '{"type":"answer","identifier":"q","startDate":"2017-10-17T05:28:09Z","answerType":{"type":"string"},"value":3}'
      );
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError);
      if (error instanceof DecodeError) {
        expect(error.reason).toBe("type_mismatch");
        expect(error.codingPath).toEqual(["value"]);
      }
    }
  });
});

interface TimerResult extends ResultData {
  readonly type: "timer";
  readonly seconds: number;
}

const TimerResultCodable: Codable<TimerResult> = {
  metadata: typeMetadata<TimerResult>("TimerResult", "timers")
    .inherit(resultDataMetadata)
    .level(1)
    .field("seconds", shapes.integer, { required: true })
    .build(),
  decode: (reader) => ({
    type: "timer",
    ...readResultFields(reader),
    seconds: reader.integer("seconds"),
  }),
  encode: (value, writer) => {
    writeResultFields(writer, value).integer("seconds", value.seconds);
  },
};

const timerEntry = defineType<ResultData, TimerResult>({
  discriminator: "timer",
  example: { type: "timer", identifier: "timer", startDate: start, seconds: 30 },
  is: (value): value is TimerResult => value.type === "timer",
  codable: TimerResultCodable,
});

describe("createResultContext", () => {
  it("registers additional result types", () => {
    const context = createResultContext({ results: [timerEntry] });
    const collection = context.decodePolymorphic(
      ResultDataInterface,
      '{"type":"collection","identifier":"c","startDate":"2017-10-17T05:28:09Z","children":[' +
        '{"type":"timer","identifier":"t","startDate":"2017-10-17T05:28:09Z","seconds":30}]}'
    );
    expect(collection).toEqual({
      type: "collection",
      identifier: "c",
      startDate: start,
      children: [{ type: "timer", identifier: "t", startDate: start, seconds: 30 }],
    });
    expect(context.registry("ResultData").discriminators()).toEqual([
      "answer",
      "assessment",
      "base",
      "collection",
      "error",
      "file",
      "section",
      "timer",
    ]);
  });

  it("logs when a standard type is replaced", () => {
    const lines: string[] = [];
    createResultContext({
      logger: createLogger({ verbose: true, writer: (line) => lines.push(line) }),
      results: [resultObjectEntry],
    }).registries();
    expect(lines).toEqual(['[polycodec] ResultData: replacing registration for "base"']);
  });

  it("passes configuration to the context", () => {
    const context = createResultContext({ config: { indent: 2, locale: "de-DE" } });
    expect(context.locale).toBe("de-DE");
    expect(context.stringify(context.encodePolymorphic(AnswerTypeInterface, { type: "string" }))).toBe(
      '{\n  "type": "string"\n}'
    );
  });
});
