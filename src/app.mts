import "dotenv/config";
import { createServer } from "node:http";
import Database from "better-sqlite3";
import { Client, Events, GatewayIntentBits } from "discord.js";
import { createServerAdapter } from "@whatwg-node/server";
import { AutoRouter } from "itty-router";
import { loadEnv } from "./config.mjs";
import { Server } from "./server.mjs";
import { installServices } from "./services/install.mjs";
import { getCommands } from "./commands/commands.mjs";
import { JobRunner } from "./base/job-runner.mjs";
import { flushSentry, initSentry } from "./services/log/sentry.mjs";

const env = loadEnv(process.env);
initSentry(env);

const db = new Database(env.DATABASE_PATH);
db.pragma("journal_mode = WAL");

const services = installServices({ env, db });
const { logService, databaseService, presenceGateway, squadTrackerService } = services;
databaseService.migrate();

const jobRunner = new JobRunner({ logService });
const server = new Server({
  router: AutoRouter(),
  env,
  services,
  commands: getCommands(services, env),
  jobRunner,
});

const httpServer = createServer(
  createServerAdapter(async (request: Request): Promise<Response> => server.router.fetch(request)),
);
httpServer.listen(env.PORT, () => {
  logService.info(`Interactions endpoint listening on port ${env.PORT.toString()}`);
});

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers,
    GatewayIntentBits.GuildPresences,
    GatewayIntentBits.GuildVoiceStates,
  ],
});
presenceGateway.attach(client);
client.once(Events.ClientReady, (readyClient) => {
  logService.info(
    `${readyClient.user.tag} is online and tracking games`,
    new Map([["guilds", readyClient.guilds.cache.size]]),
  );
});
client.on(Events.Error, (error) => {
  logService.error(error);
});

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  logService.info(`Received ${signal}, shutting down`);
  squadTrackerService.stop();
  await client.destroy();
  await new Promise<void>((resolve) => {
    httpServer.close(() => {
      resolve();
    });
  });
  await jobRunner.drain();
  db.close();
  await flushSentry();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logService.fatal(error instanceof Error ? error : String(error));
        process.exit(1);
      });
  });
}

await client.login(env.DISCORD_TOKEN);
