import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { GITHUB_MODELS_URL, GitHubModelsBackend, parseCompletion } from "../src/backend/github-models.js";
import { TokenResolver } from "../src/backend/token.js";
import { BackendError, BackendNotAvailableError } from "../src/utils/errors.js";

interface FakeServer {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

function fakeServer(status: number, data: unknown): FakeServer {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      return { data, status, statusText: "", headers: {}, config };
    },
  });
  return { http, requests };
}

function failingServer(message: string): AxiosInstance {
  return axios.create({
    adapter: async () => {
      throw new Error(message);
    },
  });
}

const withToken = () => new TokenResolver({ GH_TOKEN: "test-secret" }, async () => null);

function completion(content: string) {
  return { choices: [{ message: { role: "assistant", content } }] };
}

async function failure(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof Error) return err;
    throw err;
  }
  throw new Error("expected a rejection");
}

describe("GitHubModelsBackend", () => {
  it("names itself after the model", () => {
    const backend = new GitHubModelsBackend({ model: "openai/gpt-4o", tokens: withToken() });
    expect(backend.name).toBe("GitHub Models API (openai/gpt-4o)");
  });

  it("is available only when a token resolves", async () => {
    const available = new GitHubModelsBackend({ model: "m", tokens: withToken() });
    const missing = new GitHubModelsBackend({ model: "m", tokens: new TokenResolver({}, async () => null) });
    expect(await available.isAvailable()).toBe(true);
    expect(await missing.isAvailable()).toBe(false);
  });

  it("posts the conversation and returns the trimmed reply", async () => {
    const server = fakeServer(200, completion("  Lists files.  \n"));
    const backend = new GitHubModelsBackend({ model: "openai/gpt-4o-mini", tokens: withToken(), http: server.http });

    const reply = await backend.ask("Explain ls", { systemPrompt: "Be brief" });

    expect(reply).toBe("Lists files.");
    expect(server.requests).toHaveLength(1);
    const [request] = server.requests;
    expect(request?.url).toBe(GITHUB_MODELS_URL);
    expect(request?.method).toBe("post");
    expect(request?.timeout).toBe(120_000);
    expect(request?.headers.Authorization).toBe("Bearer test-secret");
    expect(JSON.parse(String(request?.data))).toEqual({
      messages: [
        { role: "system", content: "Be brief" },
        { role: "user", content: "Explain ls" },
      ],
      model: "openai/gpt-4o-mini",
      temperature: 0.4,
      max_tokens: 2048,
    });
  });

  it("sends only the user message without a system prompt", async () => {
    const server = fakeServer(200, completion("ok"));
    const backend = new GitHubModelsBackend({ model: "m", tokens: withToken(), http: server.http });
    await backend.ask("hi", { timeoutMs: 5000 });

    expect(JSON.parse(String(server.requests[0]?.data)).messages).toEqual([{ role: "user", content: "hi" }]);
    expect(server.requests[0]?.timeout).toBe(5000);
  });

  it("fails with BackendNotAvailableError when no token resolves", async () => {
    const server = fakeServer(200, completion("unused"));
    const backend = new GitHubModelsBackend({
      model: "m",
      tokens: new TokenResolver({}, async () => null),
      http: server.http,
    });

    const err = await failure(backend.ask("hi"));
    expect(err).toBeInstanceOf(BackendNotAvailableError);
    expect(err.message).toBe("No GitHub token available");
    expect(server.requests).toHaveLength(0);
  });

  it("reports non-200 responses with the status and body", async () => {
    const server = fakeServer(401, { message: "Bad credentials" });
    const backend = new GitHubModelsBackend({ model: "m", tokens: withToken(), http: server.http });

    const err = await failure(backend.ask("hi"));
    expect(err).toBeInstanceOf(BackendError);
    expect(err.message).toBe('GitHub Models API HTTP 401: {"message":"Bad credentials"}');
  });

  it("truncates long response bodies to 300 characters", async () => {
    const server = fakeServer(500, "x".repeat(1000));
    const backend = new GitHubModelsBackend({ model: "m", tokens: withToken(), http: server.http });

    const err = await failure(backend.ask("hi"));
    expect(err.message).toBe(`GitHub Models API HTTP 500: ${"x".repeat(300)}`);
  });

  it("wraps transport failures", async () => {
    const backend = new GitHubModelsBackend({
      model: "m",
      tokens: withToken(),
      http: failingServer("connect ECONNREFUSED 127.0.0.1:443"),
    });

    const err = await failure(backend.ask("hi"));
    expect(err).toBeInstanceOf(BackendError);
    expect(err).not.toBeInstanceOf(BackendNotAvailableError);
    expect(err.message).toBe("GitHub Models API request failed: connect ECONNREFUSED 127.0.0.1:443");
  });

  it("truncates long transport errors to 300 characters", async () => {
    const backend = new GitHubModelsBackend({ model: "m", tokens: withToken(), http: failingServer("y".repeat(500)) });
    const err = await failure(backend.ask("hi"));
    expect(err.message).toBe(`GitHub Models API request failed: ${"y".repeat(300)}`);
  });
});

describe("parseCompletion", () => {
  it("returns the first choice's content", () => {
    expect(parseCompletion({ choices: [{ message: { content: "a" } }, { message: { content: "b" } }] })).toBe("a");
  });

  it("surfaces an API error object", () => {
    expect(() => parseCompletion({ error: { message: "Rate limit exceeded" } })).toThrow(
      "GitHub Models API error: Rate limit exceeded",
    );
    expect(() => parseCompletion({ error: "quota" })).toThrow('GitHub Models API error: "quota"');
  });

  it("rejects bodies without choices", () => {
    expect(() => parseCompletion({ choices: [] })).toThrow(
      "Failed to parse API response: choices: Array must contain at least 1 element(s)",
    );
    expect(() => parseCompletion("nope")).toThrow(BackendError);
  });
});
