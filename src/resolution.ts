export interface CompareOptions {
  /** Treat any run of whitespace as a single space and ignore leading/trailing whitespace */
  ignoreWhitespace?: boolean;
}

function normalize(content: string, options: CompareOptions): string {
  return options.ignoreWhitespace ? content.replace(/\s+/g, ' ').trim() : content;
}

/**
 * One fully resolved version of a single file.
 */
export class ResolutionFile {
  constructor(
    readonly path: string,
    readonly content: string,
  ) {}

  equals(other: ResolutionFile, options: CompareOptions = {}): boolean {
    return (
      this.path === other.path &&
      normalize(this.content, options) === normalize(other.content, options)
    );
  }
}

/**
 * A whole-merge resolution: one ResolutionFile per conflicting file, in file-list order.
 * Candidates from the resolution space and the committed resolution share this type.
 */
export class ResolutionMerge {
  private readonly resolutionFiles: ResolutionFile[];

  constructor(files: Iterable<ResolutionFile> = []) {
    this.resolutionFiles = [...files];
  }

  add(file: ResolutionFile): void {
    this.resolutionFiles.push(file);
  }

  get files(): readonly ResolutionFile[] {
    return this.resolutionFiles;
  }

  get size(): number {
    return this.resolutionFiles.length;
  }

  get(path: string): ResolutionFile | undefined {
    return this.resolutionFiles.find((f) => f.path === path);
  }

  equals(other: ResolutionMerge, options: CompareOptions = {}): boolean {
    if (this.size !== other.size) return false;
    return this.resolutionFiles.every((file, i) => file.equals(other.resolutionFiles[i], options));
  }
}
