import { describe, expect, it } from "@jest/globals";
import { extractJsonText, stripMarkdownFences } from "../extract-json.js";

describe("stripMarkdownFences", () => {
  it("removes a json fence", () => {
    expect(stripMarkdownFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it("removes a bare fence", () => {
    expect(stripMarkdownFences('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it("only trims unfenced text", () => {
    expect(stripMarkdownFences('  {"a": 1}  ')).toBe('{"a": 1}');
  });
});

describe("extractJsonText", () => {
  it("returns raw JSON unchanged", () => {
    expect(extractJsonText('{"room_id": "ch1_hub"}')).toBe('{"room_id": "ch1_hub"}');
  });

  it("finds a fenced block after prose", () => {
    const text = 'Here is the room:\n```json\n{"room_id": "ch1_hub"}\n```\nEnjoy!';
    expect(extractJsonText(text)).toBe('{"room_id": "ch1_hub"}');
  });

  it("finds a <json> tagged block", () => {
    expect(extractJsonText('Result: <json>{"ok": true}</json>')).toBe('{"ok": true}');
  });

  it("scans a balanced object out of surrounding text", () => {
    const text = 'Sure. {"name": "a } inside", "nested": {"x": [1, 2]}} Hope that helps.';
    expect(extractJsonText(text)).toBe('{"name": "a } inside", "nested": {"x": [1, 2]}}');
  });

  it("returns null when nothing parses", () => {
    expect(extractJsonText("The crypt is dark.")).toBeNull();
    expect(extractJsonText('{"unterminated": ')).toBeNull();
    expect(extractJsonText("")).toBeNull();
  });
});
