/**
 * Metadata Reader
 * Loads a TeX document once and scans its lines for bibliographic fields
 */

import { readFile } from "fs/promises";
import { unescape } from "../utils/unescape";
import { ResourceError } from "../utils/errors";
import type { TexMetadata } from "../types";

// Capture group 1 holds the field value
const PATTERNS = {
  documentClass: /^\s*\\documentclass\s*(?:\[[^\]]*\])?\s*\{([^}]*)\}/,
  languages: /^\s*\\usepackage\s*\[([^\]]*)\]\s*\{babel\}/,
  isbn: /^\s*\\ISBN\s*\{(\d+)\}/,
};

// Commands whose argument is read up to its matching closing brace, so
// nested groups survive and a second command on the same line is not swallowed
const BRACED = {
  author: /^\s*\\author\s*\{/,
  cover: /^\s*\\cover\s*\{/,
  date: /^\s*\\date\s*\{/,
  publisher: /^\s*\\publisher\s*\{/,
};

/**
 * Text between the brace opened just before `start` and its partner,
 * or undefined when the group is not closed on this line
 */
function readGroup(line: string, start: number): string | undefined {
  let depth = 1;
  for (let i = start; i < line.length; i++) {
    const char = line[i];
    if (char === "\\") {
      i++; // escaped character, e.g. \{ or \}
    } else if (char === "{") {
      depth++;
    } else if (char === "}" && --depth === 0) {
      return line.slice(start, i);
    }
  }
  return undefined;
}

export class MetadataReader {
  private readonly lines: readonly string[];

  constructor(text: string) {
    this.lines = Object.freeze(text.split(/\r?\n/));
  }

  /**
   * Read a TeX file from disk
   * Throws ResourceError with the path and OS reason when it cannot be opened
   */
  static async load(path: string): Promise<MetadataReader> {
    try {
      const text = await readFile(path, "utf-8");
      return new MetadataReader(text);
    } catch (error) {
      throw ResourceError.fromFsError(path, error);
    }
  }

  documentClass(): string | undefined {
    return this.firstMatch(PATTERNS.documentClass);
  }

  /**
   * Babel language options in source order, e.g. `[english, french]`
   */
  languages(): string[] | undefined {
    const list = this.firstMatch(PATTERNS.languages);
    if (list === undefined) return undefined;

    return list
      .split(",")
      .map((language) => language.trim())
      .filter((language) => language.length > 0);
  }

  author(): string | undefined {
    return this.firstUnescaped(BRACED.author);
  }

  cover(): string | undefined {
    return this.firstUnescaped(BRACED.cover);
  }

  date(): string | undefined {
    return this.firstUnescaped(BRACED.date);
  }

  publisher(): string | undefined {
    return this.firstUnescaped(BRACED.publisher);
  }

  isbn(): string | undefined {
    return this.firstMatch(PATTERNS.isbn);
  }

  /**
   * Snapshot of every field
   */
  read(): TexMetadata {
    return {
      documentClass: this.documentClass(),
      languages: this.languages(),
      author: this.author(),
      cover: this.cover(),
      date: this.date(),
      publisher: this.publisher(),
      isbn: this.isbn(),
    };
  }

  private firstMatch(pattern: RegExp): string | undefined {
    for (const line of this.lines) {
      const match = pattern.exec(line);
      if (match) return match[1];
    }
    return undefined;
  }

  private firstBraced(prefix: RegExp): string | undefined {
    for (const line of this.lines) {
      const match = prefix.exec(line);
      if (!match) continue;

      const value = readGroup(line, match[0].length);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  private firstUnescaped(prefix: RegExp): string | undefined {
    const value = this.firstBraced(prefix);
    return value === undefined ? undefined : unescape(value);
  }
}
