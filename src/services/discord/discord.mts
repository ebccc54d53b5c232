import { inspect } from "node:util";
import type { verifyKey as discordInteractionsVerifyKey } from "discord-interactions";
import type {
  APIApplicationCommandInteractionDataBasicOption,
  APIInteraction,
  APIGuildMember,
  APIInteractionResponseChannelMessageWithSource,
  APIMessage,
  APIUser,
  RESTError,
  RESTGetAPIGuildMemberResult,
  RESTPatchAPIWebhookWithTokenMessageResult,
  RESTPostAPIChannelMessageJSONBody,
  RESTPostAPIChannelMessageResult,
  RESTPostAPICurrentUserCreateDMChannelResult,
  RESTPostAPIWebhookWithTokenJSONBody,
  RESTPutAPIApplicationCommandsResult,
} from "discord-api-types/v10";
import {
  APIVersion,
  ApplicationCommandType,
  InteractionResponseType,
  InteractionType,
  MessageFlags,
  Routes,
} from "discord-api-types/v10";
import type { BaseCommand, BaseInteraction, CommandData } from "../../commands/base/base.mjs";
import { Preconditions } from "../../base/preconditions.mjs";
import { UnreachableError } from "../../base/unreachable-error.mjs";
import { EndUserError, EndUserErrorType } from "../../base/end-user-error.mjs";
import type { Env } from "../../config.mjs";
import type { LogService } from "../log/types.mjs";
import { JsonResponse } from "./json-response.mjs";
import { DiscordError } from "./discord-error.mjs";

export interface DiscordServiceOpts {
  env: Pick<Env, "MODE" | "DISCORD_APP_ID" | "DISCORD_TOKEN" | "DISCORD_PUBLIC_KEY">;
  logService: LogService;
  fetch: typeof fetch;
  verifyKey: typeof discordInteractionsVerifyKey;
}

export type OptionValue = APIApplicationCommandInteractionDataBasicOption["value"];

type VerifyDiscordResponse =
  | { isValid: boolean; interaction?: never; error?: never }
  | { interaction: APIInteraction; isValid: boolean; error?: never }
  | { isValid: boolean; error: string; interaction?: never };

interface InteractionResponse {
  response: JsonResponse;
  jobToComplete?: (() => Promise<void>) | undefined;
}

/**
 * Rate limit state of a route, read from the X-RateLimit-* response headers.
 * https://github.com/discord/discord-api-docs/blob/main/docs/topics/Rate_Limits.md
 */
interface RateLimit {
  remaining: number | undefined;

  /**
   * Epoch time in seconds at which the bucket resets
   */
  reset: number | undefined;
}

type DisplayableMember = Pick<APIGuildMember, "nick"> & {
  user?: Pick<APIUser, "username" | "global_name"> | undefined;
};

type FetchOptions = Omit<RequestInit, "body"> & { body?: string };

/**
 * Thin client over Discord HTTP interactions and the REST API.
 */
export class DiscordService {
  private readonly env: DiscordServiceOpts["env"];
  private readonly logService: LogService;
  private readonly globalFetch: typeof fetch;
  private readonly verifyKey: typeof discordInteractionsVerifyKey;
  private commands: Map<string, BaseCommand> | undefined = undefined;
  private readonly rateLimits = new Map<string, RateLimit>();

  constructor({ env, logService, fetch, verifyKey }: DiscordServiceOpts) {
    this.env = env;
    this.logService = logService;
    this.globalFetch = fetch;
    this.verifyKey = verifyKey;
  }

  setCommands(commands: Map<string, BaseCommand>): void {
    this.commands = commands;
  }

  async verifyDiscordRequest(request: Request): Promise<VerifyDiscordResponse> {
    const signature = request.headers.get("x-signature-ed25519");
    const timestamp = request.headers.get("x-signature-timestamp");
    const body = await request.text();
    const isValidRequest =
      signature != null &&
      timestamp != null &&
      (await this.verifyKey(body, signature, timestamp, this.env.DISCORD_PUBLIC_KEY));

    if (!isValidRequest) {
      return { isValid: false };
    }

    try {
      const parsedInteraction = JSON.parse(body) as APIInteraction;
      return { interaction: parsedInteraction, isValid: true };
    } catch (error) {
      this.logService.error(error instanceof Error ? error : String(error), new Map([["body", body]]));

      return { isValid: false, error: "Invalid JSON" };
    }
  }

  handleInteraction(interaction: APIInteraction): InteractionResponse {
    this.logService.debug(inspect(interaction, { depth: null, colors: this.env.MODE === "development" }));

    const { type } = interaction;
    switch (type) {
      case InteractionType.Ping: {
        return {
          response: new JsonResponse({
            type: InteractionResponseType.Pong,
          }),
        };
      }
      case InteractionType.ApplicationCommand: {
        return this.getCommandToExecute(interaction);
      }
      case InteractionType.MessageComponent:
      case InteractionType.ModalSubmit:
      case InteractionType.ApplicationCommandAutocomplete: {
        return {
          response: new JsonResponse({
            type: InteractionResponseType.ChannelMessageWithSource,
            data: { content: "This interaction is not supported", flags: MessageFlags.Ephemeral },
          } satisfies APIInteractionResponseChannelMessageWithSource),
        };
      }
      default: {
        throw new UnreachableError(type);
      }
    }
  }

  private getCommandToExecute(interaction: BaseInteraction): InteractionResponse {
    if (!this.commands) {
      this.logService.error("No commands found");

      return {
        response: new JsonResponse({ error: "No commands found" }, { status: 500 }),
      };
    }

    const { name } = interaction.data;
    this.logService.info("getCommandToExecute", new Map([["name", name]]));
    const command = this.commands.get(name);
    if (!command) {
      this.logService.warn("Command not found", new Map([["name", name]]));

      return {
        response: new JsonResponse({ error: "Command not found" }, { status: 400 }),
      };
    }

    const { response, jobToComplete } = command.execute(interaction);

    return {
      response: new JsonResponse(response),
      jobToComplete,
    };
  }

  extractOptions(interaction: BaseInteraction): Map<string, OptionValue> {
    if (interaction.data.type !== ApplicationCommandType.ChatInput) {
      throw new Error("Unexpected interaction type");
    }

    const options = new Map<string, OptionValue>();
    for (const option of interaction.data.options ?? []) {
      if ("value" in option) {
        options.set(option.name, option.value);
      }
    }

    return options;
  }

  getDiscordUserId(interaction: BaseInteraction): string {
    return Preconditions.checkExists(interaction.member?.user ?? interaction.user, "No user found on interaction").id;
  }

  getGuildId(interaction: BaseInteraction): string {
    if (interaction.guild_id == null) {
      throw new EndUserError("This command can only be used inside a server.", {
        title: "Server only",
        errorType: EndUserErrorType.WARNING,
        handled: true,
      });
    }

    return interaction.guild_id;
  }

  hasPermission(interaction: BaseInteraction, permission: bigint): boolean {
    const { member } = interaction;
    if (!member) {
      return false;
    }

    return (BigInt(member.permissions) & permission) === permission;
  }

  getDisplayName(member: DisplayableMember): string | undefined {
    return member.nick ?? member.user?.global_name ?? member.user?.username;
  }

  getTimestamp(isoDate: string, format: "F" | "f" | "D" | "d" | "T" | "t" | "R" = "f"): string {
    const unixTime = Math.floor(new Date(isoDate).getTime() / 1000);

    return `<t:${unixTime.toString()}:${format}>`;
  }

  async registerCommands(commands: CommandData[]): Promise<RESTPutAPIApplicationCommandsResult> {
    return this.fetch<RESTPutAPIApplicationCommandsResult>(Routes.applicationCommands(this.env.DISCORD_APP_ID), {
      method: "PUT",
      body: JSON.stringify(commands),
    });
  }

  async updateDeferredReply(
    interactionToken: string,
    data: RESTPostAPIWebhookWithTokenJSONBody,
  ): Promise<RESTPatchAPIWebhookWithTokenMessageResult> {
    return this.fetch<RESTPatchAPIWebhookWithTokenMessageResult>(
      Routes.webhookMessage(this.env.DISCORD_APP_ID, interactionToken),
      { method: "PATCH", body: JSON.stringify(data) },
    );
  }

  async updateDeferredReplyWithError(interactionToken: string, error: unknown): Promise<APIMessage | undefined> {
    const endUserError = this.handleError(error);

    try {
      return await this.updateDeferredReply(interactionToken, {
        embeds: [endUserError.discordEmbed],
      });
    } catch (replyError) {
      this.logService.warn(replyError instanceof Error ? replyError : String(replyError));
      return undefined;
    }
  }

  async getGuildMember(guildId: string, userId: string): Promise<RESTGetAPIGuildMemberResult> {
    return this.fetch<RESTGetAPIGuildMemberResult>(Routes.guildMember(guildId, userId));
  }

  async createMessage(
    channel: string,
    data: RESTPostAPIChannelMessageJSONBody,
  ): Promise<RESTPostAPIChannelMessageResult> {
    return this.fetch<RESTPostAPIChannelMessageResult>(Routes.channelMessages(channel), {
      method: "POST",
      body: JSON.stringify(data),
    });
  }

  async createDirectMessage(
    userId: string,
    data: RESTPostAPIChannelMessageJSONBody,
  ): Promise<RESTPostAPIChannelMessageResult> {
    const channel = await this.fetch<RESTPostAPICurrentUserCreateDMChannelResult>(Routes.userChannels(), {
      method: "POST",
      body: JSON.stringify({ recipient_id: userId }),
    });

    return this.createMessage(channel.id, data);
  }

  private handleError(error: unknown): EndUserError {
    if (error instanceof EndUserError) {
      if (!error.handled) {
        this.logService[error.errorType === EndUserErrorType.WARNING ? "warn" : "error"](error);
      }

      return error;
    }

    this.logService.error(error instanceof Error ? error : String(error));

    return new EndUserError("An unexpected error has occurred. It has been logged. Sorry for the inconvenience.");
  }

  private async fetch<T>(path: string, options: FetchOptions = {}, retry = false): Promise<T> {
    const rateLimitKey = this.getRateLimitKey(path);
    const rateLimit = this.rateLimits.get(rateLimitKey);

    if (rateLimit?.remaining === 0 && rateLimit.reset != null) {
      const timeUntilReset = rateLimit.reset * 1000 - Date.now();
      if (timeUntilReset > 0) {
        await new Promise((resolve) => setTimeout(resolve, timeUntilReset));
      }
    }

    const url = new URL(`/api/v${APIVersion}${path}`, "https://discord.com");
    const headers = new Headers(options.headers);
    headers.set("Authorization", `Bot ${this.env.DISCORD_TOKEN}`);
    headers.set("content-type", "application/json;charset=UTF-8");

    const fetchOptions: RequestInit = {
      ...options,
      body: options.body ?? null,
      headers,
    };

    this.logService.debug(
      "Discord API request",
      new Map([
        ["method", fetchOptions.method ?? "GET"],
        ["url", url.toString()],
      ]),
    );

    const response = await this.globalFetch(url.toString(), fetchOptions);
    if (!response.ok) {
      if (response.status === 429 && !retry) {
        this.logService.warn(
          "Discord API rate limit hit",
          new Map([
            ["path", path],
            ["status", response.status.toString()],
          ]),
        );
        const rateLimitFromResponse = this.getRateLimitFromResponse(response);

        if (rateLimitFromResponse.reset != null) {
          this.rateLimits.set(rateLimitKey, { ...rateLimitFromResponse, remaining: 0 });

          return this.fetch<T>(path, options, true);
        }
      }

      const body = await response.text();
      let error: DiscordError | Error;
      try {
        error = new DiscordError(response.status, JSON.parse(body) as RESTError);
      } catch {
        error = new Error(`Failed to fetch data from Discord API (HTTP ${response.status.toString()}): ${body}`);
      }

      throw error;
    }

    const rateLimitFromResponse = this.getRateLimitFromResponse(response);
    if (rateLimitFromResponse.reset != null) {
      this.rateLimits.set(rateLimitKey, rateLimitFromResponse);
    }

    if (response.status === 204) {
      return {} as T;
    }

    const data: unknown = await response.json();
    return data as T;
  }

  private getRateLimitFromHeader(headers: Headers, key: string): number | undefined {
    const value = headers.get(key);
    if (value == null) {
      return undefined;
    }

    return Number(value);
  }

  private getRateLimitFromResponse({ headers }: Response): RateLimit {
    return {
      remaining: this.getRateLimitFromHeader(headers, "X-RateLimit-Remaining"),
      reset: this.getRateLimitFromHeader(headers, "X-RateLimit-Reset"),
    };
  }

  private getRateLimitKey(path: string): string {
    // user routes share a bucket
    if (path.startsWith(Routes.user("*").replace("*", ""))) {
      return "/users/*";
    }

    return path;
  }
}
