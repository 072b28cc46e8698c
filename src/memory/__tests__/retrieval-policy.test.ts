import { describe, it, expect } from "vitest";
import { classifyIntent, decideRetrievalMode } from "../retrieval-policy.js";

describe("decideRetrievalMode", () => {
  it("skips long-term memory for greetings and acknowledgements", () => {
    for (const message of ["hi", "Hi!", "  OK  ", "thank you.", "Thanks!!", "bye"]) {
      expect(decideRetrievalMode(message)).toBe("session");
    }
  });

  it("retrieves for anything else", () => {
    expect(decideRetrievalMode("Hi, can you help me set up FastAPI?")).toBe("active");
    expect(decideRetrievalMode("What database did I say I use?")).toBe("active");
    expect(decideRetrievalMode("no thanks, I prefer tabs")).toBe("active");
    expect(decideRetrievalMode("")).toBe("active");
  });
});

describe("classifyIntent", () => {
  it("recognizes greetings", () => {
    expect(classifyIntent("Good morning!")).toBe("greeting");
    expect(classifyIntent("hey")).toBe("greeting");
  });

  it("recognizes commands by their leading word", () => {
    expect(classifyIntent("Remember that I use black")).toBe("command");
    expect(classifyIntent("don't use tabs")).toBe("command");
    expect(classifyIntent("Always add type hints")).toBe("command");
    expect(classifyIntent("Setting up the database now")).toBe("statement");
  });

  it("treats anything with a question mark as a question", () => {
    expect(classifyIntent("What's my name?")).toBe("question");
    expect(classifyIntent("hi?")).toBe("question");
    expect(classifyIntent("I live in Berlin")).toBe("statement");
  });
});
