import { describe, it, expect, afterEach } from "vitest";
import { interpolate, interpolateObject, interpolateAssertions } from "./interpolate.js";

describe("interpolate", () => {
  afterEach(() => {
    delete process.env.TRACECHECK_REGION;
  });

  it("fills suite vars into a pattern", () => {
    expect(interpolate("order ${ORDER_ID} for ${CUSTOMER}", { ORDER_ID: "A-100", CUSTOMER: "Ada" })).toBe(
      "order A-100 for Ada"
    );
  });

  it("reads ${ENV.NAME} from the environment", () => {
    process.env.TRACECHECK_REGION = "eu-west";
    expect(interpolate("region=${ENV.TRACECHECK_REGION}", {})).toBe("region=eu-west");
  });

  it("resolves unknown names to the empty string", () => {
    expect(interpolate("[${MISSING}][${ENV.TRACECHECK_REGION}]", {})).toBe("[][]");
  });
});

describe("interpolateObject", () => {
  it("walks chain steps and argument maps", () => {
    const result = interpolateObject(
      {
        steps: [
          { tool: "login", result_includes: ["${TOKEN_PREFIX}"] },
          { tool: "fetch_order", args_match: { id: "^${ORDER_ID}$" } },
        ],
        min: 1,
        no_error: true,
      },
      { TOKEN_PREFIX: "tok_", ORDER_ID: "42" }
    );
    expect(result).toEqual({
      steps: [
        { tool: "login", result_includes: ["tok_"] },
        { tool: "fetch_order", args_match: { id: "^42$" } },
      ],
      min: 1,
      no_error: true,
    });
  });

  it("keeps null expected arguments as presence checks", () => {
    expect(interpolateObject({ expected_args: { note: null, id: "${ID}" } }, { ID: "7" })).toEqual({
      expected_args: { note: null, id: "7" },
    });
  });
});

describe("interpolateAssertions", () => {
  it("interpolates params and leaves type and message untouched", () => {
    const result = interpolateAssertions(
      [
        {
          type: "tool_result_includes",
          params: { tool: "get_order", patterns: ["${ORDER_ID}"] },
          message: "order ${ORDER_ID} must be shown",
        },
      ],
      { ORDER_ID: "A-100" }
    );
    expect(result).toEqual([
      {
        type: "tool_result_includes",
        params: { tool: "get_order", patterns: ["A-100"] },
        message: "order ${ORDER_ID} must be shown",
      },
    ]);
  });

  it("does not mutate the input", () => {
    const input = [{ type: "content_includes", params: { patterns: ["${X}"] } }];
    interpolateAssertions(input, { X: "y" });
    expect(input[0].params).toEqual({ patterns: ["${X}"] });
  });
});
