import type { RESTError } from "discord-api-types/v10";
import { RESTJSONErrorCodes } from "discord-api-types/v10";

export class DiscordError extends Error {
  public readonly httpStatus: number;
  public readonly restError: RESTError;

  public constructor(httpStatus: number, restError: RESTError) {
    super(`Discord API Error (HTTP ${httpStatus.toString()}, code ${restError.code.toString()}): ${restError.message}`);

    this.name = "DiscordError";
    this.httpStatus = httpStatus;
    this.restError = restError;
  }

  /**
   * Missing access to the channel, or a member that does not accept direct messages from the bot.
   */
  get isForbidden(): boolean {
    return (
      this.httpStatus === 403 ||
      this.restError.code === RESTJSONErrorCodes.MissingAccess ||
      this.restError.code === RESTJSONErrorCodes.CannotSendMessagesToThisUser
    );
  }
}
