import { beforeEach } from "vitest";

// =============================================================================
// GIT IDENTITY
//
// Temp repositories commit and tag; keep them independent of the host's
// global git config.
// =============================================================================

const GIT_ENV: Record<string, string> = {
  GIT_AUTHOR_NAME: "Release Bot",
  GIT_AUTHOR_EMAIL: "release-bot@example.test",
  GIT_COMMITTER_NAME: "Release Bot",
  GIT_COMMITTER_EMAIL: "release-bot@example.test",
  GIT_CONFIG_NOSYSTEM: "1",
  GIT_TERMINAL_PROMPT: "0",
};

function applyGitEnv(): void {
  for (const [key, value] of Object.entries(GIT_ENV)) {
    process.env[key] = value;
  }
  delete process.env.BOMSMITH_CONFIG;
}

applyGitEnv();

beforeEach(() => {
  applyGitEnv();
});
