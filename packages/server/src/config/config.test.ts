import test, { before, after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { ConfigError, configFromEnv, DEV_API_KEY, loadConfig, resolveConfig } from "./config.js";

let tmpRoot = "";

before(async () => {
  tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "ecoscore-config-"));
});

after(async () => {
  await fs.rm(tmpRoot, { recursive: true, force: true });
});

async function writeConfig(name: string, content: string) {
  const file = path.join(tmpRoot, name);
  await fs.writeFile(file, content);
  return file;
}

// ----------------------
// loadConfig
// ----------------------

test("loadConfig: reads a valid file", async () => {
  const file = await writeConfig(
    "valid.json",
    JSON.stringify({ server: { port: 9001 }, logLevel: "warn", apiKeys: ["key-a"], rateLimit: { max: 10 } }),
  );
  const config = await loadConfig(file);
  assert.equal(config?.server?.port, 9001);
  assert.equal(config?.logLevel, "warn");
  assert.deepEqual(config?.apiKeys, ["key-a"]);
  assert.equal(config?.rateLimit?.max, 10);
});

test("loadConfig: missing optional file returns undefined", async () => {
  assert.equal(await loadConfig(path.join(tmpRoot, "absent.json"), { optional: true }), undefined);
});

test("loadConfig: missing required file is a ConfigError", async () => {
  const file = path.join(tmpRoot, "absent.json");
  await assert.rejects(loadConfig(file), (error: unknown) => {
    assert.ok(error instanceof ConfigError);
    assert.equal(error.message, `[--config]: cannot read ${file} (file_not_found)`);
    return true;
  });
});

test("loadConfig: invalid JSON", async () => {
  const file = await writeConfig("broken.json", "{ port: ");
  await assert.rejects(loadConfig(file), { name: "ConfigError", message: `[--config]: invalid JSON in ${file}` });
});

test("loadConfig: unknown keys and bad values are rejected", async () => {
  const unknownKey = await writeConfig("unknown.json", JSON.stringify({ colour: "green" }));
  await assert.rejects(loadConfig(unknownKey), ConfigError);

  const badLevel = await writeConfig("level.json", JSON.stringify({ logLevel: "loud" }));
  await assert.rejects(loadConfig(badLevel), /^ConfigError: \[--config\]: logLevel: /);
});

// ----------------------
// configFromEnv
// ----------------------

test("configFromEnv: parses numbers and comma separated keys", () => {
  const config = configFromEnv({
    PORT: "9000",
    HOST: "127.0.0.1",
    LOG_LEVEL: "debug",
    ECOSCORE_API_KEYS: " key-a, key-b ,,",
    RATE_LIMIT_MAX: "20",
    RATE_LIMIT_WINDOW_MS: "60000",
  });
  assert.equal(config.server?.port, 9000);
  assert.equal(config.server?.host, "127.0.0.1");
  assert.equal(config.logLevel, "debug");
  assert.deepEqual(config.apiKeys, ["key-a", "key-b"]);
  assert.equal(config.rateLimit?.max, 20);
  assert.equal(config.rateLimit?.windowMs, 60000);
});

test("configFromEnv: empty environment yields nothing", () => {
  const config = configFromEnv({});
  assert.equal(config.server?.port, undefined);
  assert.equal(config.logLevel, undefined);
  assert.equal(config.apiKeys, undefined);
});

test("configFromEnv: API_KEY is accepted for a single key", () => {
  assert.deepEqual(configFromEnv({ API_KEY: "solo-key" }).apiKeys, ["solo-key"]);
});

test("configFromEnv: invalid values", () => {
  assert.throws(() => configFromEnv({ PORT: "eighty" }), { message: 'PORT must be an integer, got "eighty"' });
  assert.throws(() => configFromEnv({ LOG_LEVEL: "loud" }), ConfigError);
  assert.throws(() => configFromEnv({ RATE_LIMIT_MAX: "0" }), ConfigError);
});

// ----------------------
// resolveConfig
// ----------------------

test("resolveConfig: CLI > config file > env > default", () => {
  const config = resolveConfig({
    cli: { port: 1111 },
    file: { server: { port: 2222, host: "file-host" }, rateLimit: { max: 7 } },
    env: { server: { port: 3333, host: "env-host" }, logLevel: "warn", rateLimit: { max: 9, windowMs: 500 } },
  });
  assert.equal(config.port, 1111);
  assert.equal(config.host, "file-host");
  assert.equal(config.logLevel, "warn");
  assert.deepEqual(config.rateLimit, { max: 7, windowMs: 500 });
  assert.deepEqual(config.sources, {
    host: "config",
    port: "cli",
    logLevel: "env",
    apiKeys: "default",
    rateLimit: "config",
  });
});

test("resolveConfig: defaults and the development key", () => {
  const config = resolveConfig();
  assert.equal(config.host, "0.0.0.0");
  assert.equal(config.port, 8000);
  assert.equal(config.logLevel, "info");
  assert.deepEqual(config.rateLimit, { max: 5, windowMs: 1000 });
  assert.deepEqual(config.apiKeys, [DEV_API_KEY]);
  assert.equal(config.usingDevApiKey, true);
});

test("resolveConfig: configured keys replace the development key and are deduplicated", () => {
  const config = resolveConfig({ env: { apiKeys: ["key-a", "key-b", "key-a"] } });
  assert.deepEqual(config.apiKeys, ["key-a", "key-b"]);
  assert.equal(config.usingDevApiKey, false);
  assert.equal(config.sources.apiKeys, "env");
});
