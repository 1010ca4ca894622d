import { describe, expect, it } from "vitest";
import { PIPELINE_STAGES, isPipelineStage, parsePipelineStage } from "../src/core/pipelines/stage";

describe("PipelineStage", () => {
  it("lists the stages in the order they run", () => {
    expect(PIPELINE_STAGES).toEqual(["pre_build", "build", "post_build"]);
  });

  it("parses the snake case names", () => {
    expect(parsePipelineStage("pre_build")).toBe("pre_build");
    expect(parsePipelineStage("post_build")).toBe("post_build");
    expect(isPipelineStage("build")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isPipelineStage("postBuild")).toBe(false);
    expect(isPipelineStage(1)).toBe(false);
    expect(() => parsePipelineStage("PRE_BUILD")).toThrow(
      'unknown pipeline stage "PRE_BUILD"; expected one of pre_build, build, post_build'
    );
  });
});
