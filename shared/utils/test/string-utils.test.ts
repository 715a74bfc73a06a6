import { describe, it, expect } from "vitest";
import {
  Slugger,
  calculateReadingTime,
  pluralize,
  slugify,
  truncateText,
} from "../src/string-utils";

describe("string-utils", () => {
  describe("slugify", () => {
    it("should convert to lowercase", () => {
      expect(slugify("Hello World")).toBe("hello-world");
      expect(slugify("MiXeD CaSe")).toBe("mixed-case");
    });

    it("should remove special characters", () => {
      expect(slugify("ASP.NET Core")).toBe("aspnet-core");
      expect(slugify("C#")).toBe("c");
      expect(slugify("price: $99.99")).toBe("price-9999");
    });

    it("should collapse hyphens, underscores and whitespace", () => {
      expect(slugify("hello---world")).toBe("hello-world");
      expect(slugify("My Post_Name")).toBe("my-post-name");
      expect(slugify("  -trimmed-  ")).toBe("trimmed");
    });
  });

  describe("Slugger", () => {
    it("should suffix repeated slugs", () => {
      const slugger = new Slugger();

      expect(slugger.slug("Setup")).toBe("setup");
      expect(slugger.slug("Setup")).toBe("setup-1");
      expect(slugger.slug("setup")).toBe("setup-2");
      expect(slugger.slug("Other")).toBe("other");
    });

    it("should skip suffixes already taken by other headings", () => {
      const slugger = new Slugger();

      expect(slugger.slug("Step 1")).toBe("step-1");
      expect(slugger.slug("Step")).toBe("step");
      expect(slugger.slug("Step")).toBe("step-2");
      expect(slugger.slug("Step 1")).toBe("step-1-1");
    });

    it("should name headings without word characters", () => {
      const slugger = new Slugger();

      expect(slugger.slug("???")).toBe("section");
      expect(slugger.slug("!!!")).toBe("section-1");
    });
  });

  describe("pluralize", () => {
    it("should pluralize common endings", () => {
      expect(pluralize("error")).toBe("errors");
      expect(pluralize("entry")).toBe("entries");
      expect(pluralize("box")).toBe("boxes");
    });

    it("should keep the singular for a count of one", () => {
      expect(pluralize("file", 1)).toBe("file");
      expect(pluralize("file", 0)).toBe("files");
    });
  });

  describe("calculateReadingTime", () => {
    it("should round up at 200 words per minute", () => {
      expect(calculateReadingTime("")).toBe(1);
      expect(calculateReadingTime("word ".repeat(200))).toBe(1);
      expect(calculateReadingTime("word ".repeat(201))).toBe(2);
    });
  });

  describe("truncateText", () => {
    it("should cut at a word boundary", () => {
      expect(truncateText("short", 10)).toBe("short");
      expect(truncateText("model binding in depth", 15)).toBe(
        "model binding...",
      );
      expect(truncateText("abcdefghij", 5)).toBe("abcde...");
    });
  });
});
