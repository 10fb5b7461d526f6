// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors.js";
import {
  IPV6_CIDR_DEFAULT,
  enableIpv6,
  mergeIpv6Settings,
  parseDaemonConfig,
} from "../../src/system/ipv6.js";
import { failureOf, makeHarness, runHarness, runTestExit, successOf } from "../helpers/layers.js";

describe("mergeIpv6Settings", () => {
  test("adds both settings to an unrelated config", () => {
    expect(mergeIpv6Settings('{"log-level":"warn"}', { "log-level": "warn" })).toEqual(
      Option.some({ "log-level": "warn", ipv6: true, "fixed-cidr-v6": IPV6_CIDR_DEFAULT })
    );
  });

  test("keeps an existing ipv6 value", () => {
    expect(mergeIpv6Settings('{"ipv6":false}', { ipv6: false })).toEqual(
      Option.some({ ipv6: false, "fixed-cidr-v6": IPV6_CIDR_DEFAULT })
    );
  });

  test("leaves a config mentioning fixed-cidr-v6 untouched", () => {
    const raw = '{"fixed-cidr-v6":"fd00::/80"}';
    expect(Option.isNone(mergeIpv6Settings(raw, { "fixed-cidr-v6": "fd00::/80" }))).toBe(true);
  });
});

describe("parseDaemonConfig", () => {
  test("empty content is an empty object", async () => {
    const exit = await runTestExit(parseDaemonConfig("  \n", "/etc/docker/daemon.json"));
    expect(successOf(exit)).toEqual({});
  });

  test("invalid JSON is a parse error", async () => {
    const exit = await runTestExit(parseDaemonConfig("not json", "/etc/docker/daemon.json"));
    const error = Option.getOrThrow(failureOf(exit));
    expect(error.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
  });

  test("a non-object is a validation error", async () => {
    const exit = await runTestExit(parseDaemonConfig("42", "/etc/docker/daemon.json"));
    const error = Option.getOrThrow(failureOf(exit));
    expect(error.code).toBe(ErrorCode.CONFIG_VALIDATION_ERROR);
  });
});

describe("enableIpv6", () => {
  const configFile = Option.some("/etc/docker/daemon.json");

  test("writes merged settings and restarts through service", async () => {
    const h = makeHarness({
      shell: {
        available: ["service", "systemctl"],
        responses: [{ prefix: "sudo cat", stdout: '{\n  "log-level": "warn"\n}\n' }],
      },
    });

    successOf(await runHarness(h, enableIpv6({ configFile, restart: true })));

    expect(h.shell.mutations()).toEqual([
      "sudo mkdir -p /etc/docker",
      "sudo touch /etc/docker/daemon.json",
      "sudo tee /etc/docker/daemon.json > /dev/null",
      "sudo service docker restart",
    ]);
    const tee = h.shell.calls.find((c) => c.line.startsWith("sudo tee"));
    expect(tee?.stdin).toBe(
      `${JSON.stringify(
        { "log-level": "warn", ipv6: true, "fixed-cidr-v6": IPV6_CIDR_DEFAULT },
        null,
        2
      )}\n`
    );
  });

  test("falls back to systemctl", async () => {
    const h = makeHarness({ shell: { available: ["systemctl"] } });

    successOf(await runHarness(h, enableIpv6({ configFile, restart: true })));

    expect(h.shell.mutations().at(-1)).toBe("sudo systemctl restart docker");
  });

  test("warns when no service manager is found", async () => {
    const h = makeHarness();

    successOf(await runHarness(h, enableIpv6({ configFile, restart: true })));

    expect(h.shell.mutations().at(-1)).toBe("sudo tee /etc/docker/daemon.json > /dev/null");
    expect(h.logs.at(-1)).toBe("Failed to restart the Docker service");
  });

  test("makes no changes when settings exist", async () => {
    const h = makeHarness({
      shell: {
        available: ["service"],
        responses: [{ prefix: "sudo cat", stdout: '{"fixed-cidr-v6":"fd00::/80"}' }],
      },
    });

    successOf(await runHarness(h, enableIpv6({ configFile, restart: true })));

    expect(h.shell.mutations()).toEqual([
      "sudo mkdir -p /etc/docker",
      "sudo touch /etc/docker/daemon.json",
    ]);
    expect(h.logs).toContain("IPv6 settings are already present. Making no changes.");
  });

  test("uses the running daemon's config file", async () => {
    const h = makeHarness({
      shell: {
        responses: [
          {
            prefix: "ps aux",
            stdout: "root 812 0.3 1.2 9000 900 ? Ssl 10:00 0:12 /usr/bin/dockerd --config-file /srv/docker/daemon.json\n",
          },
        ],
      },
    });

    successOf(await runHarness(h, enableIpv6({ configFile: Option.none(), restart: false })));

    expect(h.shell.mutations()).toEqual([
      "sudo mkdir -p /srv/docker",
      "sudo touch /srv/docker/daemon.json",
      "sudo tee /srv/docker/daemon.json > /dev/null",
    ]);
  });

  test("dry-run neither reads nor writes the daemon config", async () => {
    const h = makeHarness({ shell: { available: ["service"] }, execution: { dryRun: true } });

    successOf(await runHarness(h, enableIpv6({ configFile, restart: true })));

    expect(h.shell.mutations()).toEqual([]);
    expect(h.shell.calls.filter((c) => c.line.startsWith("sudo cat"))).toEqual([]);
    expect(h.logs).toContain("Writing Docker config file /etc/docker/daemon.json...");
    expect(h.logs).toContain("DRY RUN: sudo service docker restart");
  });
});
