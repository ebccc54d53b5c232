import type {
  APIApplicationCommand,
  APIApplicationCommandInteraction,
  APIInteractionResponse,
} from "discord-api-types/v10";
import { InteractionResponseType, MessageFlags } from "discord-api-types/v10";
import type { Services } from "../../services/install.mjs";
import type { Env } from "../../config.mjs";
import { EndUserError } from "../../base/end-user-error.mjs";

export type CommandData = Omit<APIApplicationCommand, "id" | "application_id" | "version">;
export type BaseInteraction = APIApplicationCommandInteraction;
export interface ExecuteResponse {
  response: APIInteractionResponse;
  jobToComplete?: () => Promise<void>;
}

export abstract class BaseCommand {
  constructor(
    readonly services: Services,
    readonly env: Env,
  ) {}

  abstract readonly data: CommandData;

  abstract execute(interaction: BaseInteraction): ExecuteResponse;

  protected getStringOption(interaction: BaseInteraction, name: string): string | undefined {
    const value = this.services.discordService.extractOptions(interaction).get(name);

    return typeof value === "string" ? value : undefined;
  }

  /**
   * Immediate ephemeral reply for commands that fail before any work is deferred.
   */
  protected errorResponse(error: unknown): ExecuteResponse {
    let endUserError: EndUserError;
    if (error instanceof EndUserError) {
      endUserError = error;
    } else {
      this.services.logService.error(error instanceof Error ? error : String(error));
      endUserError = new EndUserError(
        "An unexpected error has occurred. It has been logged. Sorry for the inconvenience.",
      );
    }

    return {
      response: {
        type: InteractionResponseType.ChannelMessageWithSource,
        data: { embeds: [endUserError.discordEmbed], flags: MessageFlags.Ephemeral },
      },
    };
  }
}
