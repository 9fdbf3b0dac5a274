import { randomBytes } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LlmError } from "../infra/errors.js";
import type { ChatRequest, ChatResult } from "../llm/types.js";
import { runCli } from "./program.js";

class Collector {
  text = "";

  write(chunk: string): void {
    this.text += chunk;
  }
}

type FakeChat = (request: ChatRequest) => Promise<ChatResult>;

let home: string;

function fakeChat(reply: ChatResult = { content: "Hello" }) {
  return vi.fn(async (_request: ChatRequest): Promise<ChatResult> => reply);
}

async function run(
  argv: string[],
  options: { chat?: FakeChat; stdin?: string } = {},
): Promise<{ code: number; stdout: string; stderr: string }> {
  const stdout = new Collector();
  const stderr = new Collector();
  const code = await runCli(argv, {
    chat: options.chat ?? fakeChat(),
    stdout,
    stderr,
    readStdin: async () => options.stdin ?? "",
    env: { MQ_HOME: home },
  });
  return { code, stdout: stdout.text, stderr: stderr.text };
}

function readConfig(): { models: Record<string, Record<string, unknown>> } {
  return JSON.parse(readFileSync(join(home, "config.json"), "utf-8"));
}

async function addModel(shortname = "gpt", provider = "openai", model = "gpt-4o"): Promise<void> {
  const result = await run(["add", shortname, model, "--provider", provider]);
  expect(result.code).toBe(0);
}

beforeEach(() => {
  home = join(tmpdir(), `mq-cli-test-${randomBytes(8).toString("hex")}`);
});

afterEach(() => {
  rmSync(home, { recursive: true, force: true });
  vi.unstubAllEnvs();
});

describe("mq add / models / rm", () => {
  it("adds a model and lists it", async () => {
    await addModel();

    const result = await run(["models"]);
    expect(result).toEqual({ code: 0, stdout: "gpt\topenai\tgpt-4o\n", stderr: "" });
    expect(readConfig().models.gpt).toEqual({
      provider: "openai",
      model: "gpt-4o",
      sysprompt: null,
    });
  });

  it("prints a placeholder when nothing is configured", async () => {
    const result = await run(["models"]);
    expect(result.stdout).toBe("(no models configured)\n");
  });

  it("stores sampling options", async () => {
    await run([
      "add", "or", "meta/llama", "--provider", "openrouter",
      "--temperature", "0.5", "--top-p", "0.9", "--top-k", "40",
    ]);

    expect(readConfig().models.or).toEqual({
      provider: "openrouter",
      model: "meta/llama",
      sysprompt: null,
      temperature: 0.5,
      top_p: 0.9,
      top_k: 40,
    });
  });

  it("rejects unknown providers", async () => {
    const result = await run(["add", "x", "m", "--provider", "nope"]);
    expect(result.code).toBe(2);
    expect(result.stderr).toBe("Unknown provider: 'nope'\n");
  });

  it("rejects --sysprompt together with --sysprompt-file", async () => {
    const result = await run([
      "add", "gpt", "gpt-4o", "--provider", "openai",
      "--sysprompt", "a", "--sysprompt-file", "b.txt",
    ]);
    expect(result.code).toBe(2);
    expect(result.stderr).toBe("Use only one of --sysprompt or --sysprompt-file\n");
  });

  it("reads the system prompt from a file without trailing newlines", async () => {
    mkdirSync(home, { recursive: true });
    const file = join(home, "prompt.txt");
    writeFileSync(file, "Be terse.\n\n");

    await run(["add", "gpt", "gpt-4o", "--provider", "openai", "--sysprompt-file", file]);

    expect(readConfig().models.gpt.sysprompt).toBe("Be terse.");
  });

  it("reads the system prompt from stdin with '-'", async () => {
    const result = await run(
      ["add", "gpt", "gpt-4o", "--provider", "openai", "--sysprompt-file", "-"],
      { stdin: "From stdin\n" },
    );

    expect(result.code).toBe(0);
    expect(readConfig().models.gpt.sysprompt).toBe("From stdin");
  });

  it("reports an unreadable system prompt file", async () => {
    const missing = join(home, "missing.txt");
    const result = await run([
      "add", "gpt", "gpt-4o", "--provider", "openai", "--sysprompt-file", missing,
    ]);

    expect(result.code).toBe(2);
    expect(result.stderr.startsWith(`Failed to read sysprompt file '${missing}': `)).toBe(true);
  });

  it("removes a model", async () => {
    await addModel();
    expect((await run(["rm", "gpt"])).code).toBe(0);
    expect((await run(["models"])).stdout).toBe("(no models configured)\n");

    const again = await run(["rm", "gpt"]);
    expect(again.code).toBe(2);
    expect(again.stderr).toBe("Unknown model shortname: 'gpt'\n");
  });
});

describe("mq ask", () => {
  it("creates a session and prints its id before the response", async () => {
    await addModel();
    const chat = fakeChat();

    const result = await run(["ask", "gpt", "hi"], { chat });

    expect(result.code).toBe(0);
    expect(result.stdout).toMatch(/^session: [0-9a-f]{32}\nHello\n$/);
    expect(chat.mock.calls[0][0]).toMatchObject({
      provider: "openai",
      model: "gpt-4o",
      messages: [{ role: "user", content: "hi" }],
    });
    expect(readdirSync(join(home, "sessions"))).toHaveLength(1);
  });

  it("uses the requested session id", async () => {
    await addModel();

    const result = await run(["ask", "gpt", "--session", "s1", "hi"]);

    expect(result.stdout).toBe("session: s1\nHello\n");
    const dump = JSON.parse((await run(["dump", "--session", "s1"])).stdout);
    expect(dump).toMatchObject({
      version: 1,
      id: "s1",
      model_shortname: "gpt",
      provider: "openai",
      model: "gpt-4o",
      sysprompt: null,
      messages: [
        { role: "user", content: "hi" },
        { role: "assistant", content: "Hello" },
      ],
    });
  });

  it("refuses an existing session id before calling the model", async () => {
    await addModel();
    await run(["ask", "gpt", "--session", "s1", "hi"]);
    const chat = fakeChat();

    const result = await run(["ask", "gpt", "--session", "s1", "again"], { chat });

    expect(result.code).toBe(2);
    expect(result.stderr).toBe("Session already exists: 's1'\n");
    expect(chat).not.toHaveBeenCalled();
  });

  it("refuses an invalid session id", async () => {
    await addModel();
    const result = await run(["ask", "gpt", "--session", "bad id", "hi"]);
    expect(result.code).toBe(2);
    expect(result.stderr).toBe(
      "Invalid session id (use only letters, digits, '_' and '-', no spaces)\n",
    );
  });

  it("skips the session with -n", async () => {
    await addModel();

    const result = await run(["ask", "-n", "gpt", "hi"]);

    expect(result.stdout).toBe("session: (none)\nHello\n");
    expect(readdirSync(join(home, "sessions"))).toEqual([]);
  });

  it("prints one JSON line with --json", async () => {
    await addModel();

    const result = await run(["ask", "gpt", "--json", "--session", "s1", "hi"]);

    expect(result.stdout).toBe('{"response":"Hello","prompt":"hi","session":"s1"}\n');
  });

  it("sends and stores a system prompt override", async () => {
    await addModel();
    const chat = fakeChat();

    const result = await run(
      ["ask", "gpt", "-s", "be brief", "--json", "--session", "s1", "hi"],
      { chat },
    );

    expect(chat.mock.calls[0][0].messages).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "hi" },
    ]);
    expect(JSON.parse(result.stdout)).toEqual({
      response: "Hello",
      prompt: "hi",
      session: "s1",
      sysprompt: "be brief",
    });
    const dump = JSON.parse((await run(["dump"])).stdout);
    expect(dump.sysprompt).toBe("be brief");
    expect(dump.messages).toHaveLength(3);
  });

  it("prints the reasoning trace before the response", async () => {
    await addModel();
    const chat = fakeChat({ content: "42", reasoning: "thinking" });

    const result = await run(["ask", "-n", "gpt", "q"], { chat });

    expect(result.stdout).toBe("session: (none)\nreasoning:\nthinking\n\nresponse:\n42\n");
    expect(result.stderr).toBe("");
  });

  it("reports unknown shortnames", async () => {
    const result = await run(["ask", "nope", "hi"]);
    expect(result.code).toBe(2);
    expect(result.stderr).toBe("Unknown model shortname: 'nope'\n");
  });

  it("prints LLM errors with their details", async () => {
    await addModel();
    const chat = vi.fn(async (_request: ChatRequest): Promise<ChatResult> => {
      throw new LlmError("", {
        provider: "openai",
        model: "gpt-4o",
        type: "api_error",
        status_code: 401,
        raw_response_snippet: '{"error":"bad key"}',
      });
    });

    const result = await run(["ask", "gpt", "hi"], { chat });

    expect(result.code).toBe(2);
    expect(result.stdout).toBe("");
    expect(result.stderr).toBe(
      'LLM error (provider=openai, model=gpt-4o, type=api_error, status=401): \n' +
        'raw: {"error":"bad key"}\n',
    );
    expect(existsSync(join(home, "last_conversation.json"))).toBe(false);
  });
});

describe("mq continue / dump", () => {
  it("continues the latest session", async () => {
    await addModel();
    await run(["ask", "gpt", "--session", "s1", "hi"]);
    const chat = fakeChat({ content: "More" });

    const result = await run(["continue", "go on"], { chat });

    expect(result.stdout).toBe("session: s1\nMore\n");
    expect(chat.mock.calls[0][0].messages).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "Hello" },
      { role: "user", content: "go on" },
    ]);
    const dump = JSON.parse((await run(["dump"])).stdout);
    expect(dump.messages).toHaveLength(4);
    expect(dump.messages[3]).toEqual({ role: "assistant", content: "More" });
  });

  it("accepts the cont alias and an explicit session", async () => {
    await addModel();
    await run(["ask", "gpt", "--session", "s1", "first"]);
    await run(["ask", "gpt", "--session", "s2", "second"]);
    const chat = fakeChat();

    await run(["cont", "--session", "s1", "again"], { chat });

    expect(chat.mock.calls[0][0].messages[0]).toEqual({ role: "user", content: "first" });
  });

  it("warns that --json output omits the conversation", async () => {
    await addModel();
    await run(["ask", "gpt", "--session", "s1", "hi"]);

    const result = await run(["continue", "--json", "more"]);

    expect(result.stderr).toBe(
      "warning: --json output does not include full conversation context (use `mq dump` for history)\n",
    );
    expect(result.stdout).toBe('{"response":"Hello","prompt":"more","session":"s1"}\n');
  });

  it("fails when there is no conversation yet", async () => {
    const result = await run(["dump"]);
    expect(result.code).toBe(2);
    expect(result.stderr).toContain("No previous conversation found");
  });

  it("dumps with two-space indentation", async () => {
    await addModel();
    await run(["ask", "gpt", "--session", "s1", "hi"]);

    const result = await run(["dump"]);

    expect(result.stdout.startsWith('{\n  "version": 1,\n  "id": "s1",\n')).toBe(true);
  });
});

describe("mq session", () => {
  it("prints a placeholder when there are no sessions", async () => {
    expect((await run(["session", "list"])).stdout).toBe("(no sessions)\n");
  });

  it("lists sessions with a shortened prompt preview", async () => {
    await addModel();
    const prompt = `Hello, I'd like ${"x".repeat(300)} do you understand?`;
    await run(["ask", "gpt", "--session", "s1", prompt]);

    const lines = (await run(["session", "list"])).stdout.split("\n");

    expect(lines[0]).toMatch(/^s1\t\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
    expect(lines[1]).toBe(
      `Hello, I'd like ${"x".repeat(61)} ... ${"x".repeat(59)} do you understand?`,
    );
    expect(lines[1]).toHaveLength(160);
  });

  it("flattens multi-line prompts", async () => {
    await addModel();
    await run(["ask", "gpt", "--session", "s1", "line one\nline two\n"]);

    const lines = (await run(["session", "list"])).stdout.split("\n");

    expect(lines[1]).toBe("line one line two");
  });

  it("selects and renames sessions", async () => {
    await addModel();
    await run(["ask", "gpt", "--session", "s1", "first"]);
    await run(["ask", "gpt", "--session", "s2", "second"]);

    expect((await run(["session", "select", "s1"])).code).toBe(0);
    expect(JSON.parse((await run(["dump"])).stdout).id).toBe("s1");

    expect((await run(["session", "rename", "s1", "renamed"])).code).toBe(0);
    expect(JSON.parse((await run(["dump"])).stdout).id).toBe("renamed");

    const missing = await run(["session", "select", "s1"]);
    expect(missing.code).toBe(2);
    expect(missing.stderr).toBe("Unknown session id: 's1'\n");
  });
});

describe("mq test", () => {
  it("prints only the response and saves nothing by default", async () => {
    const result = await run(["test", "gpt", "gpt-4o", "--provider", "openai", "hello"], {
      chat: fakeChat({ content: "OK" }),
    });

    expect(result).toEqual({ code: 0, stdout: "OK\n", stderr: "" });
    expect((await run(["models"])).stdout).toBe("(no models configured)\n");
  });

  it("saves the alias with --save after a successful query", async () => {
    await run(["test", "gpt", "gpt-4o", "--provider", "openai", "--save", "hello"]);
    expect((await run(["models"])).stdout).toBe("gpt\topenai\tgpt-4o\n");
  });

  it("does not save when the query fails", async () => {
    const chat = vi.fn(async (_request: ChatRequest): Promise<ChatResult> => {
      throw new LlmError("Error (HTTP 500): boom", { provider: "openai", model: "gpt-4o" });
    });

    const result = await run(
      ["test", "gpt", "gpt-4o", "--provider", "openai", "--save", "hello"],
      { chat },
    );

    expect(result.code).toBe(2);
    expect(result.stderr).toBe(
      "LLM error (provider=openai, model=gpt-4o): Error (HTTP 500): boom\n",
    );
    expect((await run(["models"])).stdout).toBe("(no models configured)\n");
  });

  it("checks the provider before sending anything", async () => {
    const chat = fakeChat();
    const result = await run(["test", "x", "m", "--provider", "nope", "hi"], { chat });
    expect(result.code).toBe(2);
    expect(chat).not.toHaveBeenCalled();
  });
});

describe("mq help", () => {
  it("prints the detailed help", async () => {
    const result = await run(["help"]);
    expect(result.code).toBe(0);
    expect(result.stdout.startsWith("mq — Model Query CLI")).toBe(true);
    expect(result.stdout).toContain("mq ask");
    expect(result.stdout).toContain("mq session list");
  });

  it("prints usage for a command", async () => {
    const result = await run(["help", "ask"]);
    expect(result.code).toBe(0);
    expect(result.stdout).toContain("Usage: mq ask [options] <shortname> <query>");
  });

  it("prints usage for a nested command", async () => {
    const result = await run(["help", "session", "list"]);
    expect(result.stdout).toContain("Usage: mq session list [options]");
  });

  it("rejects unknown topics", async () => {
    const result = await run(["help", "nope"]);
    expect(result.code).toBe(2);
    expect(result.stderr).toBe("Unknown help topic: 'nope'\n");
  });

  it("exits 2 on unknown commands", async () => {
    const result = await run(["frobnicate"]);
    expect(result.code).toBe(2);
    expect(result.stderr).toContain("unknown command 'frobnicate'");
  });
});

describe("mq batch", () => {
  const echoChat = () =>
    vi.fn(async (request: ChatRequest): Promise<ChatResult> => ({
      content: request.messages[request.messages.length - 1].content.toUpperCase(),
    }));

  it("writes one output line per input line to stdout", async () => {
    await addModel("local", "ollama", "llama3");

    const result = await run(["batch", "local"], {
      chat: echoChat(),
      stdin: '{"prompt":"a","id":1}\n\n{"prompt":"b","id":2}\n',
    });

    expect(result.code).toBe(0);
    expect(result.stdout).toBe(
      '{"prompt":"a","id":1,"mq_input_prompt":"a","response":"A"}\n' +
        '{"prompt":"b","id":2,"mq_input_prompt":"b","response":"B"}\n',
    );
  });

  it("applies prefix, suffix and system prompt", async () => {
    await addModel("local", "ollama", "llama3");
    const chat = echoChat();

    const result = await run(
      ["batch", "local", "--prefix", "Say ", "--suffix", "!", "-s", "sys"],
      { chat, stdin: '{"prompt":"hi"}\n' },
    );

    expect(chat.mock.calls[0][0].messages).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "Say hi!" },
    ]);
    expect(result.stdout).toBe(
      '{"prompt":"Say hi!","mq_input_prompt":"hi","response":"SAY HI!","sysprompt":"sys"}\n',
    );
  });

  it("writes the output file only after the batch finishes", async () => {
    await addModel("local", "ollama", "llama3");
    mkdirSync(home, { recursive: true });
    const input = join(home, "in.jsonl");
    const output = join(home, "out", "results.jsonl");
    writeFileSync(input, '{"prompt":"x"}\n');

    const result = await run(["batch", "local", "-i", input, "-o", output, "-w", "2"], {
      chat: echoChat(),
    });

    expect(result).toEqual({ code: 0, stdout: "", stderr: "" });
    expect(readFileSync(output, "utf-8")).toBe(
      '{"prompt":"x","mq_input_prompt":"x","response":"X"}\n',
    );
    expect(readdirSync(join(home, "out"))).toEqual(["results.jsonl"]);
  });

  it("extracts tags from responses", async () => {
    await addModel("local", "ollama", "llama3");

    const result = await run(["batch", "local", "--extract-tags"], {
      chat: fakeChat({ content: "<a>1</a><b> 2 </b>" }),
      stdin: '{"prompt":"p"}\n',
    });

    expect(JSON.parse(result.stdout)).toEqual({
      prompt: "p",
      mq_input_prompt: "p",
      response: "<a>1</a><b> 2 </b>",
      "tag:a": "1",
      "tag:b": "2",
    });
  });

  it("exits 1 and records the error when a row fails", async () => {
    await addModel("local", "ollama", "llama3");
    const chat = vi.fn(async (request: ChatRequest): Promise<ChatResult> => {
      if (request.messages[0].content === "bad") {
        throw new LlmError("Error (HTTP 500): boom", {
          provider: "ollama",
          model: "llama3",
          type: "http_error",
          status_code: 500,
        });
      }
      return { content: "ok" };
    });

    const result = await run(["batch", "local"], {
      chat,
      stdin: '{"prompt":"good"}\n{"prompt":"bad"}\n',
    });

    expect(result.code).toBe(1);
    expect(result.stderr).toBe("1 of 2 row(s) failed\n");
    const lines = result.stdout.trimEnd().split("\n").map((line) => JSON.parse(line));
    expect(lines[0].response).toBe("ok");
    expect(lines[1]).toEqual({
      prompt: "bad",
      mq_input_prompt: "bad",
      error: "Error (HTTP 500): boom",
      error_info: {
        provider: "ollama",
        model: "llama3",
        type: "http_error",
        status_code: 500,
      },
    });
  });

  it("stops before any request on a merge conflict", async () => {
    await addModel("local", "ollama", "llama3");
    mkdirSync(home, { recursive: true });
    const output = join(home, "results.jsonl");
    const chat = fakeChat();

    const result = await run(["batch", "local", "-o", output], {
      chat,
      stdin: '{"prompt":"a"}\n{"prompt":"b","response":"old"}\n',
    });

    expect(result.code).toBe(2);
    expect(result.stderr).toBe(
      "merge conflict on line 2: input already has reserved key 'response'\n",
    );
    expect(chat).not.toHaveBeenCalled();
    expect(existsSync(output)).toBe(false);
  });

  it("reports invalid JSON input", async () => {
    await addModel("local", "ollama", "llama3");

    const result = await run(["batch", "local"], { stdin: '{"prompt":"a"}\nnot json\n' });

    expect(result.code).toBe(2);
    expect(result.stderr.startsWith("Invalid JSON on line 2: ")).toBe(true);
  });

  it("requires the provider's API key up front", async () => {
    vi.stubEnv("OPENAI_API_KEY", "");
    await addModel();
    const chat = fakeChat();

    const result = await run(["batch", "gpt"], { chat, stdin: '{"prompt":"a"}\n' });

    expect(result.code).toBe(2);
    expect(result.stderr).toContain("OPENAI_API_KEY");
    expect(chat).not.toHaveBeenCalled();
  });

  it("rejects a worker count below one", async () => {
    await addModel("local", "ollama", "llama3");

    const result = await run(["batch", "local", "-w", "0"], { stdin: '{"prompt":"a"}\n' });

    expect(result.code).toBe(2);
    expect(result.stderr).toContain("Worker count must be an integer >= 1.");
  });
});
