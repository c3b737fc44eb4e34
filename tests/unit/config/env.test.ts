/**
 * Unit tests for .env.local loading order.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
// Loaded once up front so the isolated loads below only re-run the modules.
import "../../../src/logging";

const KEYS = ["LOG_LEVEL", "RELAY_TEST_MARKER"] as const;

describe(".env.local", () => {
  let dir: string;
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-env-"));
    fs.writeFileSync(path.join(dir, ".env.local"), "LOG_LEVEL=debug\nRELAY_TEST_MARKER=from-file\n");
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    jest.spyOn(process, "cwd").mockReturnValue(dir);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    for (const key of KEYS) {
      const value = saved.get(key);
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("applies LOG_LEVEL from the file when the logger loads before config", async () => {
    await jest.isolateModulesAsync(async () => {
      const { logger } = await import("../../../src/logging");
      expect(logger.level).toBe("debug");
      expect(process.env.RELAY_TEST_MARKER).toBe("from-file");
    });
  });

  it("keeps variables that are already set", async () => {
    process.env.LOG_LEVEL = "warn";
    await jest.isolateModulesAsync(async () => {
      const { logger } = await import("../../../src/logging");
      expect(logger.level).toBe("warn");
    });
  });
});
