import fs from "fs/promises";
import path from "path";
import { AssetEncodingError, AssetIoError, AssetResolutionError } from "@core/errors";
import { hashedFileName } from "@core/utils/cas";
import { contentHash } from "@core/utils/hash";

export interface AssetFileOptions {
  /** Fail construction when the file name carries no extension. */
  requireExtension?: boolean;
}

const quote = (value: string) => JSON.stringify(value);

/**
 * A source file referenced by an asset declaration.
 *
 * Construction guarantees that the canonical path exists on disk and that a
 * file name and stem can be derived from it. Each pipeline owns its own
 * instance; nothing is shared or cached between pipelines resolving the same
 * path.
 */
export class AssetFile {
  private constructor(
    /** Canonical absolute path, symlinks resolved. */
    readonly path: string,
    readonly fileName: string,
    readonly fileStem: string,
    /** Extension without the leading dot, `null` when the name has none. */
    readonly ext: string | null,
  ) {}

  static async create(
    baseDir: string,
    target: string,
    options: AssetFileOptions = {},
  ): Promise<AssetFile> {
    // Relative references are resolved against the directory of the declaring document.
    const joined = path.isAbsolute(target) ? target : path.join(baseDir, target);

    let canonical: string;
    try {
      canonical = await fs.realpath(joined);
    } catch (err) {
      throw new AssetResolutionError(`error getting canonical path for ${quote(joined)}`, joined, { cause: err });
    }

    const fileName = path.basename(canonical);
    if (!fileName) {
      throw new AssetResolutionError(`asset has no file name ${quote(canonical)}`, canonical);
    }
    const parsed = path.parse(fileName);
    if (!parsed.name) {
      throw new AssetResolutionError(`asset has no file name stem ${quote(canonical)}`, canonical);
    }
    const ext = parsed.ext.length > 1 ? parsed.ext.slice(1) : null;
    if (ext === null && options.requireExtension) {
      throw new AssetResolutionError(`asset has no file extension ${quote(canonical)}`, canonical);
    }

    const stat = await fs.stat(canonical).catch((err: unknown) => {
      throw new AssetResolutionError(`target file does not appear to exist on disk ${quote(canonical)}`, canonical, { cause: err });
    });
    if (!stat.isFile()) {
      throw new AssetResolutionError(`target is not a file ${quote(canonical)}`, canonical);
    }

    return new AssetFile(canonical, fileName, parsed.name, ext);
  }

  /**
   * Copy the file into `toDir`, overwriting any file of the same name. With
   * `withHash` the destination is named after a digest of the content, so
   * unchanged input always lands on the same name.
   *
   * @returns the destination file name, without any directory
   */
  async copy(toDir: string, withHash: boolean): Promise<string> {
    const bytes = await this.readBytes("error reading file for copying");
    const fileName = withHash
      ? hashedFileName(this.fileStem, await contentHash(bytes), this.ext)
      : this.fileName;

    const filePath = path.join(toDir, fileName);
    try {
      await fs.writeFile(filePath, bytes);
    } catch (err) {
      throw new AssetIoError(`error copying file ${quote(this.path)} to ${quote(filePath)}`, filePath, { cause: err });
    }
    return fileName;
  }

  async readText(): Promise<string> {
    const bytes = await this.readBytes("error reading file");
    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch (err) {
      throw new AssetEncodingError(this.path, { cause: err });
    }
  }

  async readBytes(context = "error reading file"): Promise<Buffer> {
    try {
      return await fs.readFile(this.path);
    } catch (err) {
      throw new AssetIoError(`${context} ${quote(this.path)}`, this.path, { cause: err });
    }
  }
}
