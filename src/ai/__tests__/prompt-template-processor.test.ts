/**
 * Tests for prompt template processor with cache support
 */

import { describe, expect, test } from "@jest/globals";
import { SystemMessage } from "@langchain/core/messages";
import {
  processCachedTemplate,
  createCachedSystemMessage,
  fillTemplate,
  stripCacheMarkers,
} from "../prompt-template-processor.js";

describe("Prompt Template Processor", () => {
  describe("fillTemplate", () => {
    test("substitutes known placeholders and leaves the rest", () => {
      const result = fillTemplate("Chapter {chapterNumber}: {name} {unknown}", {
        chapterNumber: 2,
        name: "The Sunken Gate",
      });

      expect(result).toBe("Chapter 2: The Sunken Gate {unknown}");
    });

    test("leaves JSON braces untouched", () => {
      const template = '{"roomId": "{roomId}", "exits": []}';
      expect(fillTemplate(template, { roomId: "ch1_hub" })).toBe('{"roomId": "ch1_hub", "exits": []}');
    });

    test("does not rescan substituted values", () => {
      expect(fillTemplate("{a}", { a: "{b}", b: "x" })).toBe("{b}");
    });
  });

  describe("processCachedTemplate", () => {
    test("should process template without cache markers", () => {
      const template = "You write text adventures.\n\nWorld: {worldName}";
      const result = processCachedTemplate(template, { worldName: "Emberfall" });

      expect(result.hasCacheMarkers).toBe(false);
      expect(result.content).toHaveLength(1);
      expect(result.content[0].text).toBe("You write text adventures.\n\nWorld: Emberfall");
      expect(result.content[0].cache_control).toBeUndefined();
    });

    test("should split a cached world brief from the dynamic request", () => {
      const template = `!___ CACHE:world-brief ___!
World: {worldName}
Tone: grim
!___ END-CACHE ___!

Generate room {roomId}`;

      const result = processCachedTemplate(template, { worldName: "Emberfall", roomId: "ch1_gate" });

      expect(result.hasCacheMarkers).toBe(true);
      expect(result.content).toEqual([
        { type: "text", text: "World: Emberfall\nTone: grim", cache_control: { type: "ephemeral" } },
        { type: "text", text: "Generate room ch1_gate" },
      ]);
    });

    test("should process template with multiple cache sections", () => {
      const template = `!___ CACHE:intro ___!
You are a world builder.
!___ END-CACHE ___!

Current chapter: {chapter}

!___ CACHE:rules ___!
Use snake_case ids.
!___ END-CACHE ___!

Reply with JSON.`;

      const result = processCachedTemplate(template, { chapter: 3 });

      expect(result.content.map((block) => block.text)).toEqual([
        "You are a world builder.",
        "Current chapter: 3",
        "Use snake_case ids.",
        "Reply with JSON.",
      ]);
      expect(result.content.map((block) => block.cache_control?.type ?? null)).toEqual([
        "ephemeral",
        null,
        "ephemeral",
        null,
      ]);
    });
  });

  describe("createCachedSystemMessage", () => {
    test("should create simple SystemMessage without cache markers", () => {
      const message = createCachedSystemMessage("World: {worldName}", { worldName: "Emberfall" });

      expect(message).toBeInstanceOf(SystemMessage);
      expect(message.content).toBe("World: Emberfall");
    });

    test("should create SystemMessage with content blocks for cached template", () => {
      const template = `!___ CACHE:rules ___!
Follow these rules
!___ END-CACHE ___!

Question: {question}`;

      const message = createCachedSystemMessage(template, { question: "What?" });

      expect(message).toBeInstanceOf(SystemMessage);
      expect(message.content).toEqual([
        { type: "text", text: "Follow these rules", cache_control: { type: "ephemeral" } },
        { type: "text", text: "Question: What?" },
      ]);
    });
  });

  describe("stripCacheMarkers", () => {
    test("joins blocks with blank lines and drops markers", () => {
      const template = `!___ CACHE:rules ___!
Stay in the world.
!___ END-CACHE ___!
Describe {roomId}.`;

      expect(stripCacheMarkers(template, { roomId: "ch1_hub" })).toBe("Stay in the world.\n\nDescribe ch1_hub.");
    });

    test("returns plain templates filled in", () => {
      expect(stripCacheMarkers("Describe {roomId}.", { roomId: "ch1_hub" })).toBe("Describe ch1_hub.");
    });
  });
});
