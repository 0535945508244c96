export type SplitterOptions = {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
};

// paragraph, line, word, then a hard cut between characters
export const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

/**
 * Recursive character splitter. Splits on the largest separator present,
 * merges the pieces back into windows of at most `chunkSize` characters,
 * and starts every window with up to `chunkOverlap` characters carried over
 * from the previous one. Pieces still too long are split again with the
 * next separator.
 */
export class RecursiveTextSplitter {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private readonly separators: string[];

  constructor(opts: SplitterOptions) {
    if (opts.chunkSize <= 0) {
      throw new Error(`chunkSize must be positive, got ${opts.chunkSize}`);
    }
    if (opts.chunkOverlap < 0 || opts.chunkOverlap >= opts.chunkSize) {
      throw new Error(
        `chunkOverlap must be in [0, chunkSize), got ${opts.chunkOverlap} for chunkSize ${opts.chunkSize}`
      );
    }
    this.chunkSize = opts.chunkSize;
    this.chunkOverlap = opts.chunkOverlap;
    this.separators = opts.separators ?? DEFAULT_SEPARATORS;
  }

  splitText(text: string): string[] {
    return this.split(text, this.separators);
  }

  private split(text: string, separators: string[]): string[] {
    let separator = "";
    let rest: string[] = [];
    for (let i = 0; i < separators.length; i++) {
      const s = separators[i]!;
      if (s === "" || text.includes(s)) {
        separator = s;
        rest = separators.slice(i + 1);
        break;
      }
    }

    const pieces = (separator ? text.split(separator) : Array.from(text)).filter((p) => p !== "");

    const out: string[] = [];
    let fitting: string[] = [];

    for (const piece of pieces) {
      if (piece.length <= this.chunkSize) {
        fitting.push(piece);
        continue;
      }

      if (fitting.length > 0) {
        out.push(...this.merge(fitting, separator));
        fitting = [];
      }

      if (rest.length === 0) out.push(piece);
      else out.push(...this.split(piece, rest));
    }

    if (fitting.length > 0) out.push(...this.merge(fitting, separator));
    return out;
  }

  private merge(pieces: string[], separator: string): string[] {
    const sepLen = separator.length;
    const windows: string[] = [];

    let current: string[] = [];
    let total = 0;

    const flush = () => {
      const text = current.join(separator).trim();
      if (text) windows.push(text);
    };

    for (const piece of pieces) {
      const joinCost = current.length > 0 ? sepLen : 0;

      if (total + piece.length + joinCost > this.chunkSize && current.length > 0) {
        flush();

        // drop from the front until what is left fits the overlap and leaves room for `piece`
        while (
          total > this.chunkOverlap ||
          (total > 0 && total + piece.length + (current.length > 0 ? sepLen : 0) > this.chunkSize)
        ) {
          total -= current[0]!.length + (current.length > 1 ? sepLen : 0);
          current.shift();
        }
      }

      current.push(piece);
      total += piece.length + (current.length > 1 ? sepLen : 0);
    }

    flush();
    return windows;
  }
}
