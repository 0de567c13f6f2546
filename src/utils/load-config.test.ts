import { describe, it, expect } from "vitest";
import { writeFile } from "fs/promises";
import path from "node:path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";
import { withTempDir } from "../test/fixtures";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();
    expect(config.engine).toBe("latex");
    expect(config.tools).toEqual({ html: "mk4ht", ebook: "ebook-convert" });
    expect(config.ebook.format).toBe("mobi");
    expect(config.cleanup.intermediateExtensions).toHaveLength(12);
  });
});

describe("mergeConfig", () => {
  it("merges nested sections key by key", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      tools: { ebook: "/opt/calibre/ebook-convert" },
      ebook: { chapters: { book: "//h1" } },
    });

    expect(merged.tools).toEqual({
      html: "mk4ht",
      ebook: "/opt/calibre/ebook-convert",
    });
    expect(merged.ebook.chapters.book).toBe("//h1");
    expect(merged.ebook.chapters.article).toBe(base.ebook.chapters.article);
    expect(merged.ebook.format).toBe("mobi");
  });
});

describe("loadConfig", () => {
  it("applies user config, then custom config", async () => {
    await withTempDir(async (dir) => {
      const user = path.join(dir, "user.json");
      const custom = path.join(dir, "custom.json");
      await writeFile(user, JSON.stringify({ engine: "xelatex", ebook: { format: "azw3" } }));
      await writeFile(custom, JSON.stringify({ engine: "lualatex" }));

      const { config, errors } = await loadConfig(custom, user);

      expect(errors).toEqual([]);
      expect(config.engine).toBe("lualatex");
      expect(config.ebook.format).toBe("azw3");
    });
  });

  it("reports an invalid file and keeps the defaults", async () => {
    await withTempDir(async (dir) => {
      const custom = path.join(dir, "custom.json");
      await writeFile(custom, JSON.stringify({ engine: "pdflatex" }));

      const { config, errors } = await loadConfig(custom, path.join(dir, "none.json"));

      expect(config.engine).toBe("latex");
      expect(errors).toHaveLength(1);
      expect(errors[0].path).toBe(custom);
    });
  });

  it("reports unknown keys", async () => {
    await withTempDir(async (dir) => {
      const custom = path.join(dir, "custom.json");
      await writeFile(custom, JSON.stringify({ output: "somewhere" }));

      const { errors } = await loadConfig(custom, path.join(dir, "none.json"));
      expect(errors).toHaveLength(1);
    });
  });

  it("reports malformed JSON", async () => {
    await withTempDir(async (dir) => {
      const custom = path.join(dir, "custom.json");
      await writeFile(custom, "{ not json");

      const { errors } = await loadConfig(custom, path.join(dir, "none.json"));
      expect(errors[0].error).toBeInstanceOf(SyntaxError);
    });
  });
});
