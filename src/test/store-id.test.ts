import { describe, it, after } from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import {
  decodeStorePath,
  encodeStoreIdForUrl,
  encodeStorePath,
  isReservedStoreId,
  resolveStoreId,
  validateStoreId,
  validateStoreIdForCreation,
} from "../core/store-id.js";
import { defaultStoreRoot, listLocalStores, storeDbPath } from "../core/paths.js";
import { InvalidStoreIdError, ReservedStoreIdError } from "../core/errors.js";
import { tempDir } from "./helpers.js";

describe("store-id", () => {
  describe("validation", () => {
    const valid = ["a", "default", "team-a", "org/team", "a1/b2/c3/d4", "x".repeat(64), "web-app/api-v2"];
    const invalid = [
      "",
      "Org",
      "a--b",
      "-a",
      "a-",
      "a//b",
      "/a",
      "a/",
      "a/b/c/d/e",
      "x".repeat(65),
      "has space",
      "under_score",
      "a/B",
    ];

    for (const id of valid) {
      it(`accepts "${id}"`, () => {
        assert.doesNotThrow(() => validateStoreId(id));
      });
    }

    for (const id of invalid) {
      it(`rejects "${id.length > 20 ? id.slice(0, 20) + "..." : id}"`, () => {
        assert.throws(() => validateStoreId(id), InvalidStoreIdError);
      });
    }

    it("reserved ids can be targeted but not created", () => {
      assert.doesNotThrow(() => validateStoreId("default"));
      assert.throws(() => validateStoreIdForCreation("default"), ReservedStoreIdError);
      assert.throws(() => validateStoreIdForCreation("_system"), ReservedStoreIdError);
      assert.doesNotThrow(() => validateStoreIdForCreation("team-a"));
    });

    it("isReservedStoreId", () => {
      assert.equal(isReservedStoreId("default"), true);
      assert.equal(isReservedStoreId("_system"), true);
      assert.equal(isReservedStoreId("team-a"), false);
    });
  });

  describe("encoding", () => {
    it("round-trips every valid id through the path encoding", () => {
      for (const id of ["default", "a", "org/team", "a-b/c-d/e/f", "x1/y2"]) {
        assert.equal(decodeStorePath(encodeStorePath(id)), id);
      }
    });

    it("replaces / with __ for directories", () => {
      assert.equal(encodeStorePath("org/team"), "org__team");
      assert.equal(decodeStorePath("org__team__api"), "org/team/api");
    });

    it("percent-encodes / for URLs", () => {
      assert.equal(encodeStoreIdForUrl("org/team"), "org%2Fteam");
      assert.equal(encodeStoreIdForUrl("team-a"), "team-a");
    });
  });

  describe("resolveStoreId", () => {
    it("prefers the explicit argument", () => {
      assert.equal(resolveStoreId("team-a", "team-b"), "team-a");
    });

    it("falls back to the environment, then the default", () => {
      assert.equal(resolveStoreId(undefined, "team-b"), "team-b");
      assert.equal(resolveStoreId("  ", "team-b"), "team-b");
      assert.equal(resolveStoreId(undefined, undefined), "default");
      assert.equal(resolveStoreId(undefined, undefined, "org/fallback"), "org/fallback");
    });

    it("trims whitespace", () => {
      assert.equal(resolveStoreId(" team-a ", undefined), "team-a");
    });

    it("names the source of an invalid id", () => {
      assert.throws(() => resolveStoreId(undefined, "Bad"), /from LORESYNC_STORE/);
      assert.throws(() => resolveStoreId("a--b", "team-b"), /from argument/);
    });
  });

  describe("paths", () => {
    const dir = tempDir();
    after(() => dir.cleanup());

    it("defaultStoreRoot honors LORESYNC_HOME", () => {
      assert.equal(defaultStoreRoot({ LORESYNC_HOME: "/srv/lore" }), join("/srv/lore", "stores"));
    });

    it("storeDbPath encodes the id", () => {
      assert.equal(storeDbPath("org/team", "/data"), join("/data", "org__team", "lore.db"));
    });

    it("listLocalStores returns valid ids that hold a database, sorted", () => {
      for (const name of ["org__team", "alpha", "Bad__Name"]) {
        mkdirSync(join(dir.path, name), { recursive: true });
        writeFileSync(join(dir.path, name, "lore.db"), "");
      }
      mkdirSync(join(dir.path, "empty"), { recursive: true });
      writeFileSync(join(dir.path, "stray.txt"), "");

      assert.deepEqual(listLocalStores(dir.path), ["alpha", "org/team"]);
    });

    it("listLocalStores returns [] for a missing root", () => {
      assert.deepEqual(listLocalStores(join(dir.path, "nope")), []);
    });
  });
});
