import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { Brain } from "../src/core/brain.js";
import { STATUS_ANALYZING } from "../src/core/notifier.js";
import { EXHAUSTED_MESSAGE, SAFETY_MESSAGE } from "../src/core/safety.js";
import { EmptyMessageError, SchemaValidationError, TransportError } from "../src/errors.js";
import { MemoryStore } from "../src/memory/memoryStore.js";
import { logger } from "../src/utils/logger.js";
import { ScriptedLlm, approve, draft, reject, riskyState, safeState } from "./helpers/scriptedLlm.js";

describe("Brain grounding loop", () => {
  it("short-circuits on safety risk with exactly one model call", async () => {
    const llm = new ScriptedLlm([riskyState]);
    const brain = new Brain({ llm });

    const reply = await brain.run("I want to end it all", []);

    expect(reply).toBe(SAFETY_MESSAGE);
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0].schema).toBe("StateAssessment");
  });

  it("returns the draft accepted on the first attempt after 3 calls", async () => {
    const llm = new ScriptedLlm([
      safeState,
      draft("It sounds like you are worried. What is the evidence for that?"),
      approve,
    ]);
    const brain = new Brain({ llm });

    const reply = await brain.run("I will fail everything", []);

    expect(reply).toBe("It sounds like you are worried. What is the evidence for that?");
    expect(llm.calls.map((c) => c.schema)).toEqual(["StateAssessment", "Draft", "Critique"]);
    expect(llm.calls.map((c) => c.role)).toEqual(["supervisor", "therapist", "supervisor"]);
  });

  it.each([
    [1, 5],
    [2, 7],
  ])("makes 1 + 2(k+1) calls after %i rejection(s)", async (k, expectedCalls) => {
    const steps: unknown[] = [safeState];
    for (let i = 0; i < k; i++) {
      steps.push(draft(`bad draft ${i}`), reject(`fix ${i}`));
    }
    steps.push(draft("What makes you feel that way?"), approve);

    const llm = new ScriptedLlm(steps);
    const outcome = await new Brain({ llm }).respond("I feel stuck.", []);

    expect(outcome.kind).toBe("accepted");
    expect(outcome.reply).toBe("What makes you feel that way?");
    expect(llm.calls).toHaveLength(expectedCalls);
    if (outcome.kind === "accepted") expect(outcome.attempts).toBe(k + 1);
  });

  it("gives up after three rejections without further calls", async () => {
    const llm = new ScriptedLlm([
      safeState,
      draft("one"), reject("a"),
      draft("two"), reject("b"),
      draft("three"), reject("c"),
      draft("never requested"),
    ]);

    const outcome = await new Brain({ llm }).respond("Nothing works.", []);

    expect(outcome).toMatchObject({ kind: "exhausted", reply: EXHAUSTED_MESSAGE, attempts: 3 });
    if (outcome.kind === "exhausted") {
      expect(outcome.lastDraft).toEqual({
        content: "three",
        technique: "Socratic questioning",
        targetLevel: "situational",
      });
    }
    expect(llm.calls).toHaveLength(7);
  });

  it("quotes only the latest rejected draft in the retry framing", async () => {
    const llm = new ScriptedLlm([
      safeState,
      draft("You should just go for a walk."), reject("Do not give advice."),
      draft("Try journaling tonight."), reject("Still advice. Ask questions."),
      draft("What goes through your mind when that happens?"), approve,
    ]);

    await new Brain({ llm }).run("I feel stuck.", []);

    const draftCalls = llm.calls.filter((c) => c.schema === "Draft");
    expect(draftCalls[0].rolePrompt).not.toContain("Supervisor feedback");

    expect(draftCalls[1].rolePrompt).toContain("Previous draft: You should just go for a walk.");
    expect(draftCalls[1].rolePrompt).toContain("Supervisor feedback: Do not give advice.");

    expect(draftCalls[2].rolePrompt).toContain("Previous draft: Try journaling tonight.");
    expect(draftCalls[2].rolePrompt).toContain("Supervisor feedback: Still advice. Ask questions.");
    expect(draftCalls[2].rolePrompt).not.toContain("You should just go for a walk.");
    expect(draftCalls[2].rolePrompt).not.toContain("Do not give advice.");
  });

  it("passes normalized history to drafting only", async () => {
    const llm = new ScriptedLlm([safeState, draft("Tell me more."), approve]);
    const history = [
      { role: "user", content: "Valid message" },
      "invalid_string_message",
      null,
      { role: "assistant", content: "Earlier reply" },
    ];

    await new Brain({ llm }).run("Help me", history);

    const [analysis, drafting, critique] = llm.calls;
    expect(analysis.conversation).toEqual([{ role: "user", content: "Help me" }]);
    expect(drafting.conversation).toEqual([
      { role: "user", content: "Valid message" },
      { role: "assistant", content: "Earlier reply" },
      { role: "user", content: "Help me" },
    ]);
    expect(critique.conversation).toEqual([
      { role: "user", content: "Client message: Help me\n\nTherapist reply: Tell me more." },
    ]);
  });

  it("rejects an empty or missing message before any model call", async () => {
    const llm = new ScriptedLlm([safeState]);
    const brain = new Brain({ llm });

    await expect(brain.run(null, [])).rejects.toBeInstanceOf(EmptyMessageError);
    await expect(brain.run("   ", [])).rejects.toBeInstanceOf(EmptyMessageError);
    expect(llm.calls).toHaveLength(0);
  });

  it("propagates transport failures without retrying", async () => {
    const llm = new ScriptedLlm([safeState, new TransportError("backend down", 503)]);

    await expect(new Brain({ llm }).run("Hello", [])).rejects.toBeInstanceOf(TransportError);
    expect(llm.calls).toHaveLength(2);
  });

  it("propagates schema validation failures from the analysis step", async () => {
    const llm = new ScriptedLlm([{ emotion: "calm", intensity: 42 }]);

    await expect(new Brain({ llm }).run("Hello", [])).rejects.toBeInstanceOf(SchemaValidationError);
    expect(llm.calls).toHaveLength(1);
  });

  it("rejects a blank draft as a schema failure", async () => {
    const llm = new ScriptedLlm([safeState, draft("   ")]);

    await expect(new Brain({ llm }).run("Hello", [])).rejects.toBeInstanceOf(SchemaValidationError);
    expect(llm.calls).toHaveLength(2);
  });

  it("honours a smaller attempt budget", async () => {
    const llm = new ScriptedLlm([safeState, draft("one"), reject("a")]);

    const outcome = await new Brain({ llm, maxAttempts: 1 }).respond("Hi", []);

    expect(outcome.kind).toBe("exhausted");
    expect(llm.calls).toHaveLength(3);
  });
});

describe("Brain status updates", () => {
  it("works with a plain synchronous callback", async () => {
    const llm = new ScriptedLlm([safeState, draft("Tell me more."), approve]);
    const updates: string[] = [];
    const syncCallback = (text: string) => {
      updates.push(text);
    };

    const reply = await new Brain({ llm }).run("Hello", [], syncCallback);

    expect(reply).toBe("Tell me more.");
    expect(updates).toEqual([
      STATUS_ANALYZING,
      "✍️ Drafting a reply (attempt 1/3)...",
      "🧐 Supervisor is reviewing the draft (attempt 1/3)...",
    ]);
  });

  it("awaits an async callback", async () => {
    const llm = new ScriptedLlm([riskyState]);
    const asyncCallback = vi.fn(async (_text: string) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
    });

    await new Brain({ llm }).run("Hello", [], asyncCallback);

    expect(asyncCallback).toHaveBeenCalledTimes(1);
    expect(asyncCallback).toHaveBeenCalledWith(STATUS_ANALYZING);
  });

  it("keeps going when the callback throws or rejects", async () => {
    const llm = new ScriptedLlm([safeState, draft("Tell me more."), approve]);
    let calls = 0;
    const flaky = async (_text: string) => {
      calls++;
      if (calls === 1) throw new Error("message is not modified");
    };
    const throwing = (_text: string) => {
      throw new Error("render conflict");
    };

    await expect(new Brain({ llm }).run("Hello", [], flaky)).resolves.toBe("Tell me more.");

    llm.push(safeState, draft("Go on."), approve);
    await expect(new Brain({ llm }).run("Hello", [], throwing)).resolves.toBe("Go on.");
  });
});

describe("Brain memory persistence", () => {
  let memoryDir: string;

  beforeEach(async () => {
    memoryDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "companion-brain-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(memoryDir, { recursive: true, force: true });
  });

  it("stores the accepted reply with its technique and assessment", async () => {
    const memory = new MemoryStore({ memoryDir });
    const llm = new ScriptedLlm([safeState, draft("What is the evidence?", "Evidence testing"), approve]);

    await new Brain({ llm, memory }).run("I will fail everything", [], undefined, "subject-1");

    const content = await fs.promises.readFile(memory.filePathFor("subject-1"), "utf8");
    expect(content).toContain("- **Emotion**: anxiety\n");
    expect(content).toContain("- **Intensity**: 6/10\n");
    expect(content).toContain("- **Cognitive Level**: situational\n");
    expect(content).toContain("- **Distortion**: catastrophizing\n");
    expect(content).toContain("**User**: I will fail everything\n");
    expect(content).toContain("**Agent**: What is the evidence?\n");
    expect(content).toContain("**Technique Used**: Evidence testing\n");
  });

  it("stores the fallback without a technique when every draft is rejected", async () => {
    const memory = new MemoryStore({ memoryDir });
    const llm = new ScriptedLlm([
      safeState,
      draft("one"), reject("a"),
      draft("two"), reject("b"),
      draft("three"), reject("c"),
    ]);

    await new Brain({ llm, memory }).run("Nothing works.", [], undefined, "subject-1");

    const content = await fs.promises.readFile(memory.filePathFor("subject-1"), "utf8");
    expect(content).toContain(`**Agent**: ${EXHAUSTED_MESSAGE}\n`);
    expect(content).toContain("- **Emotion**: anxiety\n");
    expect(content).not.toContain("**Technique Used**");
  });

  it("skips persistence without a subject id", async () => {
    const memory = new MemoryStore({ memoryDir });
    const llm = new ScriptedLlm([riskyState]);

    await new Brain({ llm, memory }).run("Hello", []);

    expect(await memory.listSubjects()).toEqual([]);
  });

  it("logs a failed save and still returns the reply", async () => {
    const memory = new MemoryStore({ memoryDir });
    vi.spyOn(memory, "save").mockRejectedValue(new Error("disk full"));
    const errorLog = vi.spyOn(logger, "error").mockImplementation(() => {});
    const llm = new ScriptedLlm([safeState, draft("Tell me more."), approve]);

    const reply = await new Brain({ llm, memory }).run("Hello", [], undefined, "subject-1");

    expect(reply).toBe("Tell me more.");
    expect(memory.save).toHaveBeenCalledTimes(1);
    expect(errorLog).toHaveBeenCalledWith("❌ Failed to save memory for subject-1: Error: disk full");
  });
});
