import path from "node:path";
import { describe, expect, it } from "vitest";
import { resolveConfigPath, resolveStateDir, resolveUserPath } from "./paths.js";

describe("resolveUserPath", () => {
  it("expands ~ against the home directory", () => {
    expect(resolveUserPath("~/photos", {}, () => "/home/test")).toBe(
      path.join(path.resolve("/home/test"), "photos"),
    );
    expect(resolveUserPath("~", {}, () => "/home/test")).toBe(path.resolve("/home/test"));
  });

  it("prefers MEDIA_RENAMER_HOME over the OS home", () => {
    const env = { MEDIA_RENAMER_HOME: "/srv/renamer-home" };
    expect(resolveUserPath("~/x.json", env, () => "/home/other")).toBe(
      path.join(path.resolve("/srv/renamer-home"), "x.json"),
    );
  });

  it("resolves relative paths and keeps empty input empty", () => {
    expect(resolveUserPath("  ", {}, () => "/home/test")).toBe("");
    expect(resolveUserPath("conf/renamer.json", {}, () => "/home/test")).toBe(
      path.resolve("conf/renamer.json"),
    );
  });
});

describe("state + config paths", () => {
  it("defaults to ~/.media-renamer/config.json", () => {
    const home = path.resolve("/home/test");
    expect(resolveStateDir({}, () => "/home/test")).toBe(path.join(home, ".media-renamer"));
    expect(resolveConfigPath({}, () => "/home/test")).toBe(
      path.join(home, ".media-renamer", "config.json"),
    );
  });

  it("uses MEDIA_RENAMER_STATE_DIR when set", () => {
    const env = { MEDIA_RENAMER_STATE_DIR: "/custom/state" };
    expect(resolveStateDir(env, () => "/home/test")).toBe(path.resolve("/custom/state"));
    expect(resolveConfigPath(env, () => "/home/test")).toBe(
      path.join(path.resolve("/custom/state"), "config.json"),
    );
  });

  it("honors an explicit MEDIA_RENAMER_CONFIG_PATH override", () => {
    const env = {
      MEDIA_RENAMER_CONFIG_PATH: "~/renamer.json",
      MEDIA_RENAMER_STATE_DIR: "/custom/state",
    };
    expect(resolveConfigPath(env, () => "/home/test")).toBe(
      path.join(path.resolve("/home/test"), "renamer.json"),
    );
  });
});
