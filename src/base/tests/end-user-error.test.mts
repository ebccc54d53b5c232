import type { APIEmbed } from "discord-api-types/v10";
import { describe, it, expect } from "vitest";
import { EndUserError, EndUserErrorType, EndUserErrorColor } from "../end-user-error.mjs";

describe("EndUserError", () => {
  describe("constructor", () => {
    it("creates an error with default options", () => {
      const error = new EndUserError("Something went wrong");

      expect(error.endUserMessage).toBe("Something went wrong");
      expect(error.title).toBe("Something went wrong");
      expect(error.errorType).toBe(EndUserErrorType.ERROR);
      expect(error.handled).toBe(false);
      expect(error.data).toEqual({});
    });

    it("creates an error with custom options", () => {
      const error = new EndUserError("Custom error message", {
        title: "Custom Title",
        errorType: EndUserErrorType.WARNING,
        handled: true,
        data: { key: "value" },
      });

      expect(error.endUserMessage).toBe("Custom error message");
      expect(error.title).toBe("Custom Title");
      expect(error.errorType).toBe(EndUserErrorType.WARNING);
      expect(error.handled).toBe(true);
      expect(error.data).toEqual({ key: "value" });
    });

    it("inherits from Error", () => {
      const error = new EndUserError("Test error");

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("EndUserError");
      expect(error.message).toBe("Test error");
    });

    it("takes message and stack from the inner error", () => {
      const innerError = new Error("Inner error message");
      const error = new EndUserError("End user message", { innerError });

      expect(error.message).toBe("Inner error message");
      expect(error.stack).toBe(innerError.stack);
      expect(error.endUserMessage).toBe("End user message");
    });
  });

  describe("discordEmbed", () => {
    it("renders an error embed without fields when there is no data", () => {
      const error = new EndUserError("Could not find your account", { title: "Registration failed" });

      expect(error.discordEmbed).toEqual<APIEmbed>({
        title: "Registration failed",
        description: "Could not find your account",
        color: EndUserErrorColor.ERROR,
        fields: [],
      });
    });

    it("renders a warning embed with additional information", () => {
      const error = new EndUserError("Try again later", {
        errorType: EndUserErrorType.WARNING,
        data: { "Riot ID": "Sova#NA1", Region: "na" },
      });

      expect(error.discordEmbed).toEqual<APIEmbed>({
        title: "Something went wrong",
        description: "Try again later",
        color: EndUserErrorColor.WARNING,
        fields: [
          {
            name: "Additional Information",
            value: "**Riot ID**: Sova#NA1\n**Region**: na",
          },
        ],
      });
    });
  });

  describe("appendData()", () => {
    it("merges new data into existing data", () => {
      const error = new EndUserError("message", { data: { first: "1" } });

      error.appendData({ second: "2", first: "one" });

      expect(error.data).toEqual({ first: "one", second: "2" });
    });
  });
});
