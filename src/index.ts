export * from "./types";
export { AssetFile, type AssetFileOptions } from "@core/asset-file";
export {
  AssetBuildError,
  AssetBuildFailure,
  AssetDeclarationError,
  AssetEncodingError,
  AssetIoError,
  AssetResolutionError,
  type DeclarationErrorReason,
} from "@core/errors";
export * from "@core/pipelines";
export { AssetOrchestrator, type CompletedAsset, type OrchestratorOptions, type Spawnable } from "@core/orchestrator";
export { FinalizeQueue } from "@core/finalize-queue";
export { IgnoreChannel, type IgnoreChannelOptions, type OverflowPolicy } from "@core/ignore-channel";
export { HtmlPipeline, scanAssetReferences, type HtmlBuildResult, type HtmlPipelineOptions, type ScannedAsset } from "@core/html";
export { BuildSystem, type BuildReport, type BuildSystemOptions } from "@core/build";
export { spawnToolRunner, ToolError, type ToolInvocation, type ToolResult, type ToolRunner } from "@core/tools";
export { contentHash } from "@core/utils/hash";
export { hashedFileName, publicHref } from "@core/utils/cas";
export { resolveBuildConfig, normalizePublicUrl, type BuildCliOptions } from "@cli/utils/build-config";
export { loadKilnConfig, resetKilnConfigCache } from "@cli/utils/config";
