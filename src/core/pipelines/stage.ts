/**
 * A stage in the build process, used by an external hook scheduler to decide
 * when a hook runs. Serialized in lowercase snake case.
 */
export type PipelineStage = "pre_build" | "build" | "post_build";

export const PIPELINE_STAGES: readonly PipelineStage[] = ["pre_build", "build", "post_build"];

export function isPipelineStage(value: unknown): value is PipelineStage {
  return typeof value === "string" && PIPELINE_STAGES.some((stage) => stage === value);
}

export function parsePipelineStage(value: unknown): PipelineStage {
  if (isPipelineStage(value)) return value;
  throw new Error(
    `unknown pipeline stage ${JSON.stringify(value)}; expected one of ${PIPELINE_STAGES.join(", ")}`
  );
}
