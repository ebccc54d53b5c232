import type { Env } from "../config.mjs";
import type { Services } from "../services/install.mjs";
import type { BaseCommand } from "./base/base.mjs";
import { RegisterCommand } from "./register/register.mjs";
import { UnregisterCommand } from "./unregister/unregister.mjs";
import { SetChannelCommand } from "./setchannel/setchannel.mjs";
import { StatsCommand } from "./stats/stats.mjs";
import { LastMatchCommand } from "./lastmatch/lastmatch.mjs";

export function getCommands(services: Services, env: Env): Map<string, BaseCommand> {
  const commandMap = new Map<string, BaseCommand>();
  const commands = [
    new RegisterCommand(services, env),
    new UnregisterCommand(services, env),
    new SetChannelCommand(services, env),
    new StatsCommand(services, env),
    new LastMatchCommand(services, env),
  ];

  for (const command of commands) {
    if (commandMap.has(command.data.name)) {
      throw new Error(`Duplicate command name: ${command.data.name}`);
    }

    commandMap.set(command.data.name, command);
  }

  return commandMap;
}
