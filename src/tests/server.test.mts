import type { MockInstance } from "vitest";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { AutoRouter } from "itty-router";
import { InteractionResponseType, MessageFlags } from "discord-api-types/v10";
import { Server } from "../server.mjs";
import type { Env } from "../config.mjs";
import { getCommands } from "../commands/commands.mjs";
import { JobRunner } from "../base/job-runner.mjs";
import { aFakeEnvWith } from "../base/fakes/env.fake.mjs";
import type { Services } from "../services/install.mjs";
import { installFakeServicesWith } from "../services/fakes/services.mjs";
import { aFakeDiscordServiceWith } from "../services/discord/fakes/discord.fake.mjs";
import { aChatInputInteractionWith, apiMessage, pingInteraction } from "../services/discord/fakes/data.mjs";
import type { FakeLogService } from "../services/log/fakes/log.fake.mjs";
import { aFakeLogServiceWith } from "../services/log/fakes/log.fake.mjs";

function anInteractionRequest(body: unknown, signed = true): Request {
  const headers = new Headers({ "content-type": "application/json" });
  if (signed) {
    headers.set("x-signature-ed25519", "test-signature");
    headers.set("x-signature-timestamp", "1735689600");
  }

  return new Request("http://localhost/interactions", { method: "POST", body: JSON.stringify(body), headers });
}

describe("Server", () => {
  let env: Env;
  let logService: FakeLogService;
  let services: Services;
  let jobRunner: JobRunner;
  let server: Server;
  let verifyKey: MockInstance<() => Promise<boolean>>;

  beforeEach(() => {
    env = aFakeEnvWith();
    logService = aFakeLogServiceWith();
    const verifyKeyHolder = { verifyKey: async (): Promise<boolean> => Promise.resolve(true) };
    verifyKey = vi.spyOn(verifyKeyHolder, "verifyKey");
    services = installFakeServicesWith({
      env,
      logService,
      discordService: aFakeDiscordServiceWith({ env, logService, verifyKey: verifyKeyHolder.verifyKey }),
    });
    jobRunner = new JobRunner({ logService });
    server = new Server({
      router: AutoRouter(),
      env,
      services,
      commands: getCommands(services, env),
      jobRunner,
    });
  });

  describe("GET /", () => {
    it("responds with a greeting containing the DISCORD_APP_ID", async () => {
      const res: Response = await server.router.fetch(new Request("http://localhost/", { method: "GET" }));

      expect(res.status).toBe(200);
      expect(await res.text()).toBe("👋 Squad tracker is running (DISCORD_APP_ID: DISCORD_APP_ID) 🎮");
    });
  });

  describe("POST /interactions", () => {
    it("rejects an unsigned request", async () => {
      const res: Response = await server.router.fetch(anInteractionRequest(pingInteraction, false));

      expect(res.status).toBe(401);
      expect(await res.text()).toBe("Bad request signature.");
      expect(logService.messages("warn")).toEqual(["Invalid Discord request (failed verification)"]);
    });

    it("rejects a request with a bad signature", async () => {
      verifyKey.mockResolvedValue(false);

      const res: Response = await server.router.fetch(anInteractionRequest(pingInteraction));

      expect(res.status).toBe(401);
    });

    it("answers a ping with a pong", async () => {
      const res: Response = await server.router.fetch(anInteractionRequest(pingInteraction));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ type: InteractionResponseType.Pong });
    });

    it("replies to an immediate command", async () => {
      const res: Response = await server.router.fetch(anInteractionRequest(aChatInputInteractionWith("unregister")));

      expect(await res.json()).toEqual({
        type: InteractionResponseType.ChannelMessageWithSource,
        data: { content: "❌ You're not currently registered in this server.", flags: MessageFlags.Ephemeral },
      });
      expect(jobRunner.size).toBe(0);
    });

    it("runs deferred command work after responding", async () => {
      let releaseReply = (): void => undefined;
      const replyReleased = new Promise<void>((resolve) => {
        releaseReply = resolve;
      });
      const updateDeferredReplyWithErrorSpy = vi
        .spyOn(services.discordService, "updateDeferredReplyWithError")
        .mockImplementation(async () => {
          await replyReleased;
          return apiMessage;
        });

      const res: Response = await server.router.fetch(anInteractionRequest(aChatInputInteractionWith("stats")));

      expect(await res.json()).toEqual({ type: InteractionResponseType.DeferredChannelMessageWithSource });
      expect(jobRunner.size).toBe(1);

      releaseReply();
      await jobRunner.drain();

      expect(jobRunner.size).toBe(0);
      expect(updateDeferredReplyWithErrorSpy).toHaveBeenCalledWith(
        "fake-token",
        expect.objectContaining({ endUserMessage: "You're not registered in this server. Use `/register` first!" }),
      );
    });

    it("responds 400 for an unknown command", async () => {
      const res: Response = await server.router.fetch(anInteractionRequest(aChatInputInteractionWith("unknown")));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Command not found" });
    });
  });

  describe("Unknown route", () => {
    it("responds with 404", async () => {
      const res: Response = await server.router.fetch(new Request("http://localhost/unknown", { method: "GET" }));

      expect(res.status).toBe(404);
      expect(await res.text()).toBe("Not Found.");
    });
  });
});
