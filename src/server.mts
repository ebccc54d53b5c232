import type { AutoRouterType } from "itty-router";
import type { Env } from "./config.mjs";
import type { Services } from "./services/install.mjs";
import type { BaseCommand } from "./commands/base/base.mjs";
import type { JobRunner } from "./base/job-runner.mjs";

interface ServerOpts {
  router: AutoRouterType;
  env: Pick<Env, "DISCORD_APP_ID">;
  services: Pick<Services, "discordService" | "logService">;
  commands: Map<string, BaseCommand>;
  jobRunner: JobRunner;
}

export class Server {
  readonly router: AutoRouterType;
  private readonly env: Pick<Env, "DISCORD_APP_ID">;
  private readonly services: Pick<Services, "discordService" | "logService">;
  private readonly jobRunner: JobRunner;

  constructor({ router, env, services, commands, jobRunner }: ServerOpts) {
    this.router = router;
    this.env = env;
    this.services = services;
    this.jobRunner = jobRunner;

    this.services.discordService.setCommands(commands);
    this.addRoutes();
  }

  private addRoutes(): void {
    this.router.get("/", () => {
      return new Response(`👋 Squad tracker is running (DISCORD_APP_ID: ${this.env.DISCORD_APP_ID}) 🎮`);
    });

    this.router.post("/interactions", async (request: Request) => {
      const { discordService, logService } = this.services;

      try {
        const { isValid, interaction, error } = await discordService.verifyDiscordRequest(request);
        if (!isValid || !interaction) {
          logService.warn(
            "Invalid Discord request (failed verification)",
            new Map([
              ["error", error ?? "Bad signature"],
              ["headers", JSON.stringify(Array.from(request.headers.entries()))],
            ]),
          );
          return new Response("Bad request signature.", { status: 401 });
        }

        const { response, jobToComplete } = discordService.handleInteraction(interaction);

        if (jobToComplete) {
          this.jobRunner.run(`interaction:${interaction.id}`, jobToComplete);
        }

        return response;
      } catch (error) {
        logService.error(error instanceof Error ? error : String(error));

        return new Response("Internal error", { status: 500 });
      }
    });

    this.router.all("*", () => new Response("Not Found.", { status: 404 }));
  }
}
