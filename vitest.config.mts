import { coverageConfigDefaults, defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.mts"],
    restoreMocks: true,
    // issue: https://github.com/vitest-dev/vitest/issues/7288
    fakeTimers: {
      toFake: ["setTimeout", "clearTimeout", "Date"],
    },
    coverage: {
      reporter: ["text", "json-summary", "json", "html"],
      reportOnFailure: true,
      exclude: [...coverageConfigDefaults.exclude, "**/fakes/**", "**/install.mts", "src/app.mts", "src/deploy-commands.mts"],
    },
  },
});
