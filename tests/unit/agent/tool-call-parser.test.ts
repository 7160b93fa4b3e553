import { describe, it, expect } from "vitest";

import {
  extractToolCalls,
  formatToolCall,
  looksLikeToolCallMarkup,
  stripToolCalls,
} from "../../../src/agent/tool-call-parser.js";

describe("extractToolCalls()", () => {
  it("returns nothing for plain prose", () => {
    expect(extractToolCalls("The file says hello world.")).toEqual([]);
  });

  it("extracts several calls in order", () => {
    const text = [
      "First I will read the file.",
      '<tool>{"tool":"file-io","params":{"action":"read","path":"x.txt"}}</tool>',
      "Then list the folder.",
      '<tool>{"tool":"file-io","params":{"action":"list","path":"."}}</tool>',
    ].join("\n");

    expect(extractToolCalls(text)).toEqual([
      { tool: "file-io", params: { action: "read", path: "x.txt" } },
      { tool: "file-io", params: { action: "list", path: "." } },
    ]);
  });

  it("skips a malformed span and keeps scanning", () => {
    const text =
      '<tool>{"tool": "shell", params: oops}</tool> middle ' +
      '<tool>{"tool":"shell","params":{"command":"ls"}}</tool>';

    expect(extractToolCalls(text)).toEqual([{ tool: "shell", params: { command: "ls" } }]);
  });

  it("skips spans without a tool name or with non-object params", () => {
    const text =
      '<tool>{"params":{}}</tool>' +
      '<tool>{"tool":"  ","params":{}}</tool>' +
      '<tool>{"tool":"a","params":[1,2]}</tool>' +
      '<tool>["tool"]</tool>' +
      '<tool>{"tool":"b"}</tool>';

    expect(extractToolCalls(text)).toEqual([{ tool: "b", params: {} }]);
  });

  it("matches delimiters case-insensitively", () => {
    expect(extractToolCalls('<TOOL>{"tool":"x","params":{"n":1}}</Tool>')).toEqual([{ tool: "x", params: { n: 1 } }]);
  });

  it("stops at an unterminated opening tag", () => {
    const text = '<tool>{"tool":"a","params":{}}</tool> <tool>{"tool":"b","params":{}}';
    expect(extractToolCalls(text)).toEqual([{ tool: "a", params: {} }]);
  });

  it("keeps a literal closing tag inside a JSON string", () => {
    const text = 'Writing docs <tool>{"tool":"file-io","params":{"content":"use </tool> to close"}}</tool> ok';
    expect(extractToolCalls(text)).toEqual([{ tool: "file-io", params: { content: "use </tool> to close" } }]);
  });

  it("keeps the tool name exactly as written", () => {
    expect(extractToolCalls('<tool>{"tool":" echo ","params":{}}</tool>')).toEqual([{ tool: " echo ", params: {} }]);
  });

  it("does not let a span overlap the next one", () => {
    const text = '<tool>{"tool":"a","params":{}} <tool>{"tool":"b","params":{}}</tool>';
    // The first open tag runs to the first close tag, so its body is invalid JSON.
    expect(extractToolCalls(text)).toEqual([]);
  });
});

describe("formatToolCall()", () => {
  it("produces the wire form", () => {
    expect(formatToolCall({ tool: "shell", params: { command: "ls", args: ["-la"] } })).toBe(
      '<tool>{"tool":"shell","params":{"command":"ls","args":["-la"]}}</tool>'
    );
  });

  it("escapes angle brackets inside the JSON body", () => {
    expect(formatToolCall({ tool: "echo", params: { text: "<b>" } })).toBe(
      '<tool>{"tool":"echo","params":{"text":"\\u003cb\\u003e"}}</tool>'
    );
  });

  it("round-trips a call whose params contain tool markup", () => {
    const call = {
      tool: "file-io",
      params: { action: "write", path: "doc.md", content: "Wrap calls as <tool>{...}</tool> in replies." },
    };
    expect(extractToolCalls(formatToolCall(call))).toEqual([call]);
  });

  it("round-trips a tool name with surrounding spaces", () => {
    const call = { tool: " echo ", params: {} };
    expect(extractToolCalls(formatToolCall(call))).toEqual([call]);
  });

  it("round-trips through extractToolCalls", () => {
    const call = { tool: "http-fetch", params: { url: "https://example.test/a?b=<c>", headers: { accept: "text/plain" } } };
    expect(extractToolCalls(`before ${formatToolCall(call)} after`)).toEqual([call]);
  });
});

describe("stripToolCalls()", () => {
  it("removes spans and collapses blank lines", () => {
    const text = 'Reading now.\n\n<tool>{"tool":"x","params":{}}</tool>\n\n\nDone.';
    expect(stripToolCalls(text)).toBe("Reading now.\n\nDone.");
  });
});

describe("looksLikeToolCallMarkup()", () => {
  it("detects an opening tag", () => {
    expect(looksLikeToolCallMarkup("a <Tool> b")).toBe(true);
    expect(looksLikeToolCallMarkup("no tags")).toBe(false);
  });
});
