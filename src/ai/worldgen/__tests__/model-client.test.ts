import { describe, expect, it, jest } from "@jest/globals";
import { ModelClient } from "../model-client.js";
import { ProviderConfig, ProviderConfigSchema } from "../schemas.js";
import { ScriptedChatModel, replyInOrder } from "../test/scripted-chat-model.js";

const providerConfig = (overrides: Partial<ProviderConfig> = {}): ProviderConfig =>
  ProviderConfigSchema.parse({ provider: "openai", model: "test-model", requestDelayMs: 500, retryDelayMs: 50, ...overrides });

const overloaded = () => Object.assign(new Error("Overloaded"), { type: "overloaded_error" });

function clientWith(
  model: ScriptedChatModel,
  config: ProviderConfig = providerConfig(),
  now: () => number = () => 1000
) {
  const sleeps: number[] = [];
  const onStatus = jest.fn<(status: string) => void>();
  const client = new ModelClient({
    config,
    credential: "test-secret",
    model,
    now,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    onStatus,
  });
  return { client, sleeps, onStatus };
}

describe("ModelClient", () => {
  it("returns the reply text and counts tokens", async () => {
    const { client } = clientWith(new ScriptedChatModel(replyInOrder(['{"ok": true}'])));

    await expect(client.send("hello", "system")).resolves.toEqual({
      ok: true,
      content: '{"ok": true}',
      tokensUsed: 10,
      attempts: 1,
    });
    expect(client.tokensUsed).toBe(10);
  });

  it("waits requestDelayMs between consecutive requests", async () => {
    const { client, sleeps } = clientWith(new ScriptedChatModel(replyInOrder(["one", "two"])));

    await client.send("first");
    await client.send("second");

    expect(sleeps).toEqual([500]);
  });

  it("counts time since the previous reply toward the request delay", async () => {
    let clock = 10_000;
    const { client, sleeps } = clientWith(
      new ScriptedChatModel(replyInOrder(["one", "two", "three"])),
      providerConfig({ requestDelayMs: 1000 }),
      () => clock
    );

    await client.send("first");
    clock += 700;
    await client.send("second");
    clock += 1500;
    await client.send("third");

    expect(sleeps).toEqual([300]);
  });

  it("runs queued requests one at a time, in order", async () => {
    const model = new ScriptedChatModel((prompt) => `reply to ${prompt}`);
    const { client } = clientWith(model);

    const results = await Promise.all([client.send("a"), client.send("b"), client.send("c")]);

    expect(model.prompts).toEqual(["a", "b", "c"]);
    expect(results.map((r) => (r.ok ? r.content : r.error))).toEqual(["reply to a", "reply to b", "reply to c"]);
  });

  it("retries failed calls until one succeeds", async () => {
    const model = new ScriptedChatModel(replyInOrder([overloaded(), new Error("socket hang up"), "done"]));
    const { client, sleeps, onStatus } = clientWith(model);

    const result = await client.send("prompt");

    expect(result).toEqual({ ok: true, content: "done", tokensUsed: 10, attempts: 3 });
    expect(sleeps).toEqual([50, 50]);
    expect(onStatus.mock.calls).toEqual([
      ["Provider overloaded, retrying (1/3)..."],
      ["Request failed, retrying (2/3)..."],
    ]);
  });

  it("gives up after maxRetries attempts", async () => {
    const model = new ScriptedChatModel(() => new Error("boom"));
    const { client } = clientWith(model, providerConfig({ maxRetries: 2 }));

    const result = await client.send("prompt");

    expect(result).toEqual({ ok: false, error: "Request failed after 2 attempts: boom", attempts: 2 });
    expect(model.prompts).toHaveLength(2);
    expect(client.tokensUsed).toBe(0);
  });

  it("treats an empty reply as a failed attempt", async () => {
    const model = new ScriptedChatModel(replyInOrder(["   ", "filled"]));
    const { client } = clientWith(model);

    await expect(client.send("prompt")).resolves.toEqual({ ok: true, content: "filled", tokensUsed: 10, attempts: 2 });
  });
});
