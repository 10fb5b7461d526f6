// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { readFile, writeFile } from "node:fs/promises";
import { Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type AbsolutePath, pathJoin } from "../../src/lib/types.js";
import { getEnvKey, readEnvFile, setEnvKeys, upsertEnvContent } from "../../src/system/dotenv.js";
import { makeTempDir, removeTempDir, runTest } from "../helpers/layers.js";

describe("upsertEnvContent", () => {
  test("writes a new file", () => {
    expect(upsertEnvContent("", [["BREWBLOX_RELEASE", "edge"]])).toBe("BREWBLOX_RELEASE=edge\n");
  });

  test("replaces in place, drops duplicates, appends unknown keys", () => {
    const content = "# comment\nBREWBLOX_RELEASE=edge\nOTHER=x\nBREWBLOX_RELEASE=old\n";
    expect(
      upsertEnvContent(content, [
        ["BREWBLOX_RELEASE", "beta"],
        ["NEW_KEY", "1"],
      ])
    ).toBe("# comment\nBREWBLOX_RELEASE=beta\nOTHER=x\nNEW_KEY=1\n");
  });

  test("normalizes an exported assignment it rewrites", () => {
    expect(upsertEnvContent("export KEY='old'\n", [["KEY", "new"]])).toBe("KEY=new\n");
  });

  test("keeps content without a trailing newline", () => {
    expect(upsertEnvContent("A=1", [["B", "2"]])).toBe("A=1\nB=2\n");
  });
});

describe("env file access", () => {
  let dir: AbsolutePath;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  test("missing files read as empty", async () => {
    const values = await runTest(readEnvFile(pathJoin(dir, ".env")));
    expect(values).toEqual({});
  });

  test("setEnvKeys creates the file and getEnvKey reads it back", async () => {
    const file = pathJoin(dir, ".env");
    await runTest(setEnvKeys(file, [["BREWBLOX_RELEASE", "edge"]]));

    expect(await readFile(file, "utf8")).toBe("BREWBLOX_RELEASE=edge\n");
    expect(await runTest(getEnvKey(file, "BREWBLOX_RELEASE"))).toEqual(Option.some("edge"));
    expect(await runTest(getEnvKey(file, "BREWBLOX_CFG_VERSION"))).toEqual(Option.none());
  });

  test("setEnvKeys preserves unrelated lines", async () => {
    const file = pathJoin(dir, ".env");
    await writeFile(file, "COMPOSE_PROJECT_NAME=brewblox\nBREWBLOX_RELEASE=edge\n");
    await runTest(setEnvKeys(file, [["BREWBLOX_RELEASE", "beta"]]));

    expect(await readFile(file, "utf8")).toBe("COMPOSE_PROJECT_NAME=brewblox\nBREWBLOX_RELEASE=beta\n");
  });
});
