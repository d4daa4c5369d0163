import assert from "node:assert/strict";
import { test } from "node:test";

import { parseArguments } from "../../commands/parser.ts";
import type { ParameterDefinition } from "../../commands/types.ts";

const PARAMS: ParameterDefinition[] = [
  { name: "count", alias: "n", type: "number", description: "Number of events" },
  { name: "params", alias: "p", type: "string", description: "JSON parameters" },
  { name: "verbose", alias: "v", type: "boolean", isFlag: true, description: "More output" },
  { name: "recalibrate", type: "boolean", description: "Recalibrate first" },
  { name: "executable", type: "string", required: true, description: "Path" },
];

test("parseArguments", async (t) => {
  await t.test("long options with = and with a separate value", () => {
    const result = parseArguments(["--executable=/usr/bin/phd2", "--count", "5"], PARAMS);
    assert.deepEqual(result.options, { executable: "/usr/bin/phd2", count: 5 });
    assert.deepEqual(result.errors, []);
  });

  await t.test("aliases, flags and positionals", () => {
    const result = parseArguments(["get_app_state", "-v", "-p", "[1]", "--executable", "x"], PARAMS);
    assert.deepEqual(result.positional, ["get_app_state"]);
    assert.deepEqual(result.options, { verbose: true, params: "[1]", executable: "x" });
  });

  await t.test("negative numbers are values", () => {
    const result = parseArguments(["--count", "-3", "--executable", "x"], PARAMS);
    assert.equal(result.options.count, -3);
    assert.deepEqual(result.errors, []);
  });

  await t.test("boolean values", () => {
    const result = parseArguments(["--recalibrate", "true", "--executable", "x"], PARAMS);
    assert.equal(result.options.recalibrate, true);
    assert.deepEqual(
      parseArguments(["--recalibrate=maybe", "--executable", "x"], PARAMS).errors,
      ['Option --recalibrate expects true or false, got "maybe".'],
    );
  });

  await t.test("reports bad input", () => {
    const result = parseArguments(["--count", "many", "--bogus", "-z", "--verbose=1", "-p"], PARAMS);
    assert.deepEqual(result.errors, [
      'Option --count expects a number, got "many".',
      "Unknown option: --bogus",
      "Unknown option alias: -z",
      "Option --verbose is a flag and does not accept a value.",
      "Option -p (--params) requires a value.",
      "Missing required option: --executable",
    ]);
  });

  await t.test("multi-character short options are rejected", () => {
    assert.deepEqual(parseArguments(["-abc", "--executable", "x"], PARAMS).errors, [
      "Invalid short option format: -abc. Use single character aliases.",
    ]);
  });

  await t.test("help stops parsing and skips required checks", () => {
    const result = parseArguments(["--help", "--bogus"], PARAMS);
    assert.equal(result.helpRequested, true);
    assert.deepEqual(result.errors, []);
  });

  await t.test("a value option at the end is missing its value", () => {
    assert.deepEqual(parseArguments(["--executable"], PARAMS).errors, [
      "Option --executable requires a value.",
      "Missing required option: --executable",
    ]);
  });
});
