import postcss, { type AcceptedPlugin, type ProcessOptions } from "postcss";
import postcssLoadConfig from "postcss-load-config";
import { logWarn } from "@cli/utils/logger";
import { AssetFile } from "@core/asset-file";
import { emitStylesheet, finalizeStyle, type StyleContent } from "./style";
import {
  ATTR_HREF,
  ATTR_INLINE,
  AssetPipeline,
  hasAttr,
  requireAttr,
  type AssetId,
  type Attrs,
  type PipelineContext,
  type PipelineOutput,
} from "./shared";

interface LoadedPostcssConfig {
  plugins: AcceptedPlugin[];
  options: ProcessOptions;
  file: string | null;
}

const configCache = new Map<string, Promise<LoadedPostcssConfig>>();

async function loadPostcssConfig(rootDir: string, env: string): Promise<LoadedPostcssConfig> {
  try {
    const result = await postcssLoadConfig({ env }, rootDir);
    return {
      plugins: Array.isArray(result.plugins) ? result.plugins : [],
      options: result.options ?? {},
      file: result.file,
    };
  } catch (err) {
    if (err instanceof Error && err.message.startsWith("No PostCSS Config found")) {
      logWarn(`No PostCSS config found from ${rootDir}; tailwind-css assets are passed through unchanged`);
      return { plugins: [], options: {}, file: null };
    }
    throw err;
  }
}

/**
 * PostCSS config (where the tailwindcss plugin is registered) for a project
 * directory. Loaded once per directory and mode, shared by concurrent pipelines.
 */
export function getPostcssConfig(rootDir: string, release: boolean): Promise<LoadedPostcssConfig> {
  const env = release ? "production" : "development";
  const key = `${env}:${rootDir}`;
  let pending = configCache.get(key);
  if (!pending) {
    pending = loadPostcssConfig(rootDir, env);
    configCache.set(key, pending);
    void pending.catch(() => configCache.delete(key));
  }
  return pending;
}

export function resetPostcssConfigCache() {
  configCache.clear();
}

/** A tailwind entry stylesheet, compiled through the project's PostCSS pipeline. */
export class TailwindCss extends AssetPipeline<TailwindCssOutput> {
  static readonly TYPE_TAILWIND_CSS = "tailwind-css";
  readonly kind = "tailwind-css";

  private constructor(
    id: AssetId,
    ctx: PipelineContext,
    private readonly asset: AssetFile,
    private readonly inline: boolean,
  ) {
    super(id, ctx);
  }

  static async create(ctx: PipelineContext, attrs: Attrs, id: AssetId): Promise<TailwindCss> {
    const href = requireAttr(attrs, ATTR_HREF, `link rel="tailwind-css"`);
    const asset = await AssetFile.create(ctx.config.htmlDir, href, { requireExtension: true });
    return new TailwindCss(id, ctx, asset, hasAttr(attrs, ATTR_INLINE));
  }

  protected async run(): Promise<TailwindCssOutput> {
    const { htmlDir, release } = this.ctx.config;
    const source = await this.asset.readText();
    const { plugins, options } = await getPostcssConfig(htmlDir, release);
    const result = await postcss(plugins).process(source, {
      ...options,
      from: this.asset.path,
      map: false,
    });
    const content = await emitStylesheet(this.ctx.config, this.asset.fileStem, result.css, this.inline);
    return new TailwindCssOutput(this.id, content);
  }
}

export class TailwindCssOutput implements PipelineOutput {
  readonly kind = "tailwind-css";

  constructor(
    readonly id: AssetId,
    readonly content: StyleContent,
  ) {}

  finalize(dom: Document) {
    finalizeStyle(dom, this.id, this.content);
  }
}
