import fs from 'fs-extra';
import path from 'path';
import { LocalAsset, SourceSettings } from './types';
import { toRemoteKey } from './utils';

/**
 * 检查相对路径是否匹配忽略模式
 * `dir/` matches a directory anywhere in the path, `*` and `?` are wildcards,
 * anything else matches the whole path or its trailing segments.
 */
export function matchesPattern(filePath: string, pattern: string): boolean {
  if (pattern.endsWith('/')) {
    const dirPattern = pattern.slice(0, -1);
    return filePath.startsWith(dirPattern + '/') || filePath.includes('/' + dirPattern + '/');
  }

  if (pattern.includes('*') || pattern.includes('?')) {
    const regexPattern = pattern
      .replace(/[.+^${}()|[\]\\]/g, '\\$&')
      .replace(/\*/g, '.*')
      .replace(/\?/g, '.');
    const regex = new RegExp(`^(?:.*/)?${regexPattern}$`);
    return regex.test(filePath);
  }

  return filePath === pattern || filePath.endsWith('/' + pattern);
}

function normalizeExtension(extension: string): string {
  if (!extension) return '';
  return (extension.startsWith('.') ? extension : '.' + extension).toLowerCase();
}

/**
 * Enumerates the local files of a source tree as {@link LocalAsset}s.
 * Entries are visited in sorted order, so two scans of an unchanged tree
 * yield the same sequence.
 */
export class AssetScanner {
  private root: string;
  private settings: Readonly<SourceSettings>;
  private includeExtensions: Set<string>;
  private excludeDirectories: string[];

  constructor(settings: Readonly<SourceSettings>, cwd: string = process.cwd()) {
    this.settings = settings;
    this.root = path.resolve(cwd, settings.root);
    this.includeExtensions = new Set(settings.include.extensions.map(normalizeExtension));
    this.excludeDirectories = settings.exclude.directories.map((dir) => toRemoteKey(dir).replace(/^\/+|\/+$/g, ''));
  }

  get sourceRoot(): string {
    return this.root;
  }

  private isHidden(name: string): boolean {
    return this.settings.exclude.hidden && name.startsWith('.');
  }

  private isExcludedDirectory(relativePath: string): boolean {
    return this.excludeDirectories.some((dir) => relativePath === dir || relativePath.startsWith(dir + '/'));
  }

  private isExcludedFile(relativePath: string): boolean {
    const name = path.posix.basename(relativePath);
    if (this.settings.exclude.files.some((file) => file === name || toRemoteKey(file) === relativePath)) {
      return true;
    }
    if (this.settings.exclude.patterns.some((pattern) => matchesPattern(relativePath, pattern))) {
      return true;
    }
    if (this.includeExtensions.size > 0) {
      return !this.includeExtensions.has(path.extname(name).toLowerCase());
    }
    return false;
  }

  async scan(): Promise<LocalAsset[]> {
    if (!(await fs.pathExists(this.root))) {
      throw new Error(`Source directory does not exist: ${this.root}`);
    }

    const assets: LocalAsset[] = [];
    const seen = new Set<string>();
    const starts = this.settings.include.directories.length > 0
      ? this.settings.include.directories.map((dir) => path.resolve(this.root, dir))
      : [this.root];

    const walkDirectory = async (dir: string): Promise<void> => {
      const items = (await fs.readdir(dir)).sort();

      for (const item of items) {
        if (this.isHidden(item)) continue;

        const fullPath = path.join(dir, item);
        const relativePath = toRemoteKey(path.relative(this.root, fullPath));
        const stat = await fs.stat(fullPath);

        if (stat.isDirectory()) {
          if (!this.isExcludedDirectory(relativePath)) {
            await walkDirectory(fullPath);
          }
        } else if (stat.isFile()) {
          if (this.isExcludedFile(relativePath) || seen.has(relativePath)) continue;
          seen.add(relativePath);
          assets.push({
            relativePath,
            absolutePath: fullPath,
            mtime: Math.floor(stat.mtimeMs / 1000),
            size: stat.size,
            extension: path.extname(item),
          });
        }
      }
    };

    for (const start of starts) {
      if (await fs.pathExists(start)) {
        await walkDirectory(start);
      }
    }

    return assets;
  }
}
