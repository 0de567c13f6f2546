import { describe, it, expect, vi, afterEach } from "vitest";
import { writeFile, mkdir, readdir } from "fs/promises";
import path from "node:path";
import * as modules from "./index";
import { buildHtmlArgs } from "./html";
import { htmlFiles, intermediateFiles } from "./cleanup";
import { createContext, installTool, withTempDir } from "../test/fixtures";
import {
  ConversionError,
  MissingDependencyError,
  ResourceError,
} from "../utils/errors";

const TEX = [
  "\\documentclass{article}",
  "\\usepackage[english]{babel}",
  "\\author{Jane \\& Doe}",
].join("\n");

async function writeTex(dir: string, name = "paper.tex"): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, TEX, "utf-8");
  return file;
}

async function touch(dir: string, ...names: string[]): Promise<void> {
  for (const name of names) {
    await writeFile(path.join(dir, name), "", "utf-8");
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// prepare
// ============================================================================

describe("prepare", () => {
  it("resolves directory and base name", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir));
      await modules.prepare(ctx);

      expect(ctx.document).toEqual({
        source: path.join(dir, "paper.tex"),
        directory: dir,
        basename: "paper",
      });
    });
  });

  it("fails with a ResourceError for a missing input", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(path.join(dir, "absent.tex"));
      await expect(modules.prepare(ctx)).rejects.toBeInstanceOf(ResourceError);
    });
  });

  it("refuses a path with whitespace unless forced", async () => {
    await withTempDir(async (dir) => {
      const input = await writeTex(dir, "my paper.tex");

      const strict = await createContext(input);
      await expect(modules.prepare(strict)).rejects.toBeInstanceOf(ConversionError);

      const forced = await createContext(input, { force: true });
      vi.spyOn(forced.logger, "warn").mockImplementation(() => {});
      await modules.prepare(forced);
      expect(forced.document?.basename).toBe("my paper");
    });
  });
});

// ============================================================================
// dependencies
// ============================================================================

describe("dependencies", () => {
  it("passes when both tools are on PATH", async () => {
    await withTempDir(async (dir) => {
      const bin = path.join(dir, "bin");
      await mkdir(bin);
      await installTool(bin, "mk4ht");
      await installTool(bin, "ebook-convert");

      const ctx = await createContext("unused.tex");
      ctx.env = { PATH: bin };
      await expect(modules.dependencies(ctx)).resolves.toBeUndefined();
    });
  });

  it("names every missing tool", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext("unused.tex");
      ctx.env = { PATH: dir };

      const error = await modules.dependencies(ctx).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(MissingDependencyError);
      expect(error).toMatchObject({ tools: ["mk4ht", "ebook-convert"] });
    });
  });
});

// ============================================================================
// html
// ============================================================================

describe("html", () => {
  it("builds tex4ht arguments for the selected engine", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir), { engine: "xelatex" });
      await modules.prepare(ctx);

      expect(buildHtmlArgs(ctx)).toEqual([
        "htxelatex",
        "paper.tex",
        "xhtml,charset=utf-8,pmathml",
        " -cunihtf -utf8",
      ]);
    });
  });

  it("runs the converter in the document directory", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir));
      await modules.prepare(ctx);
      await modules.html(ctx);

      expect(ctx.runner).toHaveBeenCalledWith(
        "mk4ht",
        ["htlatex", "paper.tex", "xhtml,charset=utf-8,pmathml", " -cunihtf -utf8"],
        { cwd: dir },
      );
    });
  });

  it("records a failing converter without throwing", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir));
      vi.mocked(ctx.runner).mockResolvedValue(2);
      await modules.prepare(ctx);
      await modules.html(ctx);

      expect(ctx.tracker.getIssues("command")).toEqual([
        {
          type: "command",
          path: "mk4ht",
          reason: "non-zero-exit",
          details: "html step exited with code 2",
        },
      ]);
    });
  });
});

// ============================================================================
// cleanup
// ============================================================================

describe("cleanup", () => {
  it("lists intermediate files for every configured extension", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir));
      await modules.prepare(ctx);

      const files = intermediateFiles(ctx);
      expect(files).toHaveLength(12);
      expect(files[0]).toBe(path.join(dir, "paper.4ct"));
    });
  });

  it("removes only existing intermediate files", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir));
      await touch(dir, "paper.aux", "paper.log", "paper.html", "other.aux");
      await modules.prepare(ctx);
      await modules.cleanIntermediate(ctx);

      expect((await readdir(dir)).sort()).toEqual([
        "other.aux",
        "paper.html",
        "paper.tex",
      ]);
      expect(ctx.tracker.getStats().removedFiles).toEqual([
        path.join(dir, "paper.aux"),
        path.join(dir, "paper.log"),
      ]);
    });
  });

  it("keeps intermediate files when asked to", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir), { keepIntermediate: true });
      await touch(dir, "paper.aux");
      await modules.prepare(ctx);
      await modules.cleanIntermediate(ctx);

      expect(await readdir(dir)).toContain("paper.aux");
    });
  });

  it("collects split HTML pages and the stylesheet", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir));
      await touch(dir, "paper.html", "paperch1.html", "paperli1.html", "paper.css", "notes.html");
      await modules.prepare(ctx);

      expect(await htmlFiles(ctx)).toEqual([
        path.join(dir, "paper.css"),
        path.join(dir, "paper.html"),
        path.join(dir, "paperch1.html"),
        path.join(dir, "paperli1.html"),
      ]);
    });
  });

  it("removes generated HTML but leaves the ebook", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir));
      await touch(dir, "paper.html", "paperch1.html", "paper.css", "paper.mobi");
      await modules.prepare(ctx);
      await modules.cleanHtml(ctx);

      expect((await readdir(dir)).sort()).toEqual(["paper.mobi", "paper.tex"]);
    });
  });
});

// ============================================================================
// ebook
// ============================================================================

describe("ebook", () => {
  it("passes metadata flags after input and output", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir));
      await modules.prepare(ctx);
      await modules.ebook(ctx);

      expect(ctx.runner).toHaveBeenCalledWith(
        "ebook-convert",
        [
          "paper.html",
          "paper.mobi",
          "--output-profile=kindle",
          "--no-inline-toc",
          "--chapter=//*[name()='h3' and @class='sectionHead']",
          "--language=english",
          "--authors=Jane & Doe",
        ],
        { cwd: dir },
      );
      expect(ctx.metadata?.author).toBe("Jane & Doe");
      expect(ctx.tracker.getStats().outputFile).toBe(path.join(dir, "paper.mobi"));
    });
  });
});

// ============================================================================
// dry run
// ============================================================================

describe("dry run", () => {
  it("prints commands and touches nothing", async () => {
    await withTempDir(async (dir) => {
      const ctx = await createContext(await writeTex(dir), { dryRun: true });
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      await touch(dir, "paper.aux", "paper.html");

      await modules.prepare(ctx);
      await modules.html(ctx);
      await modules.cleanIntermediate(ctx);
      await modules.ebook(ctx);
      await modules.cleanHtml(ctx);

      expect(ctx.runner).not.toHaveBeenCalled();
      expect(log).toHaveBeenNthCalledWith(
        1,
        "mk4ht htlatex paper.tex xhtml,charset=utf-8,pmathml ' -cunihtf -utf8'",
      );
      expect((await readdir(dir)).sort()).toEqual(["paper.aux", "paper.html", "paper.tex"]);
      expect(ctx.tracker.getIssues()).toEqual([]);
    });
  });
});
