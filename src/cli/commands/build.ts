import { BuildSystem, type BuildReport } from "@core/build";
import { IgnoreChannel } from "@core/ignore-channel";
import { logError, logInfo } from "@cli/utils/logger";
import { loadKilnConfig } from "@cli/utils/config";
import { resolveBuildConfig, type BuildCliOptions } from "@cli/utils/build-config";

export async function runBuildCommand(options: BuildCliOptions = {}): Promise<BuildReport> {
  const ignoreChannel = new IgnoreChannel();
  try {
    const config = await loadKilnConfig();
    const buildConfig = resolveBuildConfig(config, { cli: options });
    logInfo(
      `Mode: ${buildConfig.release ? "release" : "debug"}, public url: ${buildConfig.publicUrl}, ` +
        `file hashing: ${buildConfig.filehash ? "on" : "off"}, failures: ${buildConfig.failurePolicy}`
    );
    return await new BuildSystem(buildConfig, { ignoreChannel }).build();
  } catch (err) {
    logError("kiln build failed", err);
    throw err;
  } finally {
    ignoreChannel.close();
  }
}

export interface BuildCommandFlags {
  dist?: string;
  publicUrl?: string;
  release?: boolean;
  filehash: boolean;
  aggregateErrors?: boolean;
}

/**
 * Entry point of `kiln build`. A failure only sets `process.exitCode`; the
 * process exits once in-flight pipelines have settled.
 */
export async function runBuildCli(target: string | undefined, flags: BuildCommandFlags): Promise<void> {
  try {
    await runBuildCommand({
      target,
      dist: flags.dist,
      publicUrl: flags.publicUrl,
      release: flags.release,
      filehash: flags.filehash === false ? false : undefined,
      failurePolicy: flags.aggregateErrors ? "aggregate" : undefined,
    });
  } catch {
    process.exitCode = 1;
  }
}
