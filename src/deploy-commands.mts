import "dotenv/config";
import Database from "better-sqlite3";
import { loadEnv } from "./config.mjs";
import { getCommands } from "./commands/commands.mjs";
import { installServices } from "./services/install.mjs";

const env = loadEnv(process.env);
// command data needs no persistence, so the services get a throwaway database
const services = installServices({ env, db: new Database(":memory:") });
const { discordService, logService } = services;

const commands = getCommands(services, env);
logService.info(`Started refreshing ${commands.size.toString()} application (/) commands.`);

const registered = await discordService.registerCommands([...commands.values()].map(({ data }) => data));

logService.info(`Successfully reloaded ${registered.length.toString()} application (/) commands.`);
