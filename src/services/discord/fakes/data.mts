import type {
  APIApplicationCommandInteraction,
  APIApplicationCommandInteractionDataBasicOption,
  APIGuildMember,
  APIInteractionGuildMember,
  APIMessage,
  APIPingInteraction,
} from "discord-api-types/v10";
import {
  ApplicationCommandType,
  ChannelType,
  GuildMemberFlags,
  InteractionType,
  Locale,
  MessageType,
} from "discord-api-types/v10";

export const apiMessage: APIMessage = {
  type: MessageType.Default,
  content: "Hello, world!",
  mentions: [],
  mention_roles: [],
  attachments: [],
  embeds: [],
  timestamp: "2025-01-01T00:10:00.000000+00:00",
  edited_timestamp: null,
  components: [],
  id: "1314562775950954626",
  channel_id: "announcements-channel",
  author: {
    id: "000000000000000001",
    username: "squadbot",
    avatar: null,
    discriminator: "0",
    global_name: null,
  },
  mention_everyone: false,
  pinned: false,
  tts: false,
};

export const pingInteraction: APIPingInteraction = {
  id: "fake-id",
  type: InteractionType.Ping,
  application_id: "fake-application-id",
  token: "fake-token",
  version: 1,
  app_permissions: "",
  authorizing_integration_owners: {},
  entitlements: [],
};

export const fakeInteractionMember: APIInteractionGuildMember = {
  deaf: false,
  joined_at: "2024-05-11T11:45:17.722000+00:00",
  mute: false,
  nick: null,
  permissions: "0",
  roles: [],
  user: {
    avatar: null,
    discriminator: "0",
    global_name: "Player One",
    id: "discord_user_01",
    username: "playerone",
  },
  flags: GuildMemberFlags.CompletedOnboarding,
};

export const fakeGuildMember: APIGuildMember = {
  deaf: false,
  joined_at: "2024-05-11T11:45:17.722000+00:00",
  mute: false,
  nick: "P1",
  roles: [],
  user: {
    avatar: null,
    discriminator: "0",
    global_name: "Player One",
    id: "discord_user_01",
    username: "playerone",
  },
  flags: GuildMemberFlags.CompletedOnboarding,
};

export const fakeBaseAPIApplicationCommandInteraction: Omit<APIApplicationCommandInteraction, "type" | "data"> = {
  app_permissions: "fake-permissions",
  application_id: "fake-application-id",
  authorizing_integration_owners: {},
  context: 0,
  entitlements: [],
  id: "fake-id",
  locale: Locale.EnglishUS,
  guild: {
    features: [],
    id: "guild-1",
    locale: Locale.EnglishUS,
  },
  guild_id: "guild-1",
  member: fakeInteractionMember,
  token: "fake-token",
  channel: {
    guild_id: "guild-1",
    id: "fake-channel-id",
    type: ChannelType.GuildText,
  },
  channel_id: "fake-channel-id",
  version: 1,
};

export function aChatInputInteractionWith(
  name: string,
  options: APIApplicationCommandInteractionDataBasicOption[] = [],
  overrides: Partial<Omit<APIApplicationCommandInteraction, "type" | "data">> = {},
): APIApplicationCommandInteraction {
  return {
    ...fakeBaseAPIApplicationCommandInteraction,
    ...overrides,
    type: InteractionType.ApplicationCommand,
    data: {
      id: `${name}-command-id`,
      name,
      options,
      resolved: {},
      type: ApplicationCommandType.ChatInput,
    },
  };
}
