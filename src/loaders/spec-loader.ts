/**
 * Spec file loader.
 *
 * Files are resolved against a fixed base directory, size-checked before
 * they are read and parsed with the same rules as `parseSpec`.
 *
 * @module loaders/spec-loader
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ErrorHandler } from '../errors/handler';
import { IOError, PathTraversalError } from '../errors/io-error';
import { ErrorLogger } from '../errors/logger';
import { SpecDefinitionError } from '../errors/spec-error';
import type { Spec } from '../types/spec';
import { pathExists } from '../utils/fs';
import { jsonContent, parseSpecValue, yamlContent } from '../validation/common';
import { normalizeSpecError } from '../validation/errors';

export interface SpecLoaderOptions {
  /**
   * All loaded files must resolve inside this directory
   */
  baseDir: string;

  /**
   * Whether a symbolic link may be loaded (default: false)
   */
  followSymlinks?: boolean;

  /**
   * Maximum file size in bytes (default: 1MB)
   */
  maxFileSize?: number;

  /**
   * Logger for failed loads; defaults to the shared ErrorHandler logger
   */
  logger?: ErrorLogger;
}

const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

type SpecFormat = 'json' | 'yaml';

const FORMATS: Readonly<Record<string, SpecFormat>> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
};

export class SpecLoader {
  private readonly baseDir: string;
  private readonly followSymlinks: boolean;
  private readonly maxFileSize: number;
  private readonly logger?: ErrorLogger;

  constructor(options: SpecLoaderOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.followSymlinks = options.followSymlinks ?? false;
    this.maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.logger = options.logger;
  }

  /**
   * Resolve `filePath` against the base directory.
   *
   * @throws PathTraversalError if the path escapes the base directory
   */
  sanitizePath(filePath: string): string {
    const resolvedPath = path.resolve(this.baseDir, filePath);
    const relativePath = path.relative(this.baseDir, resolvedPath);

    if (relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
      throw new PathTraversalError(filePath);
    }
    if (!resolvedPath.startsWith(this.baseDir + path.sep) && resolvedPath !== this.baseDir) {
      throw new PathTraversalError(filePath);
    }

    return resolvedPath;
  }

  /**
   * Load and parse one spec file.
   *
   * @throws PathTraversalError, IOError, SpecDefinitionError
   */
  async load(filePath: string): Promise<Spec> {
    try {
      const format = this.formatOf(filePath);
      const content = await this.read(filePath);
      return this.parse(content, format);
    } catch (error) {
      return ErrorHandler.handle(
        error,
        'spec.load',
        { data: { filePath, baseDir: this.baseDir } },
        { module: 'loaders/spec-loader', logger: this.logger }
      );
    }
  }

  private formatOf(filePath: string): SpecFormat {
    const extension = path.extname(filePath).toLowerCase();
    const format = Object.prototype.hasOwnProperty.call(FORMATS, extension)
      ? FORMATS[extension]
      : undefined;
    if (!format) {
      throw new SpecDefinitionError(
        `Unsupported spec file extension: ${extension || '(none)'} (expected .json, .yaml or .yml)`
      );
    }
    return format;
  }

  private async read(filePath: string): Promise<string> {
    const sanitizedPath = this.sanitizePath(filePath);

    if (!(await pathExists(sanitizedPath))) {
      throw new IOError(`File not found: ${filePath}`, {
        code: 'IO_NOT_FOUND',
        context: {
          requestedPath: filePath,
          resolvedPath: sanitizedPath,
        },
      });
    }

    // lstat so that a link is seen as a link
    const stats = await fs.lstat(sanitizedPath);

    if (stats.isSymbolicLink() && !this.followSymlinks) {
      throw new PathTraversalError(`Symbolic links not allowed: ${filePath}`);
    }

    const size = stats.isSymbolicLink() ? (await fs.stat(sanitizedPath)).size : stats.size;
    if (size > this.maxFileSize) {
      throw new IOError(`File too large: ${size} bytes (max: ${this.maxFileSize})`, {
        code: 'IO_SIZE_LIMIT',
        context: {
          resolvedPath: sanitizedPath,
          fileSize: size,
          maxSize: this.maxFileSize,
        },
      });
    }

    return fs.readFile(sanitizedPath, 'utf-8');
  }

  private parse(content: string, format: SpecFormat): Spec {
    let document: unknown;
    try {
      document =
        format === 'json'
          ? jsonContent(content, { maxSize: this.maxFileSize })
          : yamlContent(content, { maxSize: this.maxFileSize });
    } catch (error) {
      throw normalizeSpecError(error, `Failed to parse spec ${format.toUpperCase()}`);
    }
    return parseSpecValue(document);
  }
}
