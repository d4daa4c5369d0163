import assert from "node:assert/strict";
import { Readable } from "node:stream";
import { test } from "node:test";

import { FramingError } from "../../errors.ts";
import { decodeMessages, LineFramer } from "../../remote/framing.ts";
import { quietConsole } from "../utils/test_helpers.ts";

async function collect(chunks: (string | Uint8Array)[], framer?: LineFramer): Promise<unknown[]> {
  const values: unknown[] = [];
  for await (const value of decodeMessages(Readable.from(chunks), framer)) {
    values.push(value);
  }
  return values;
}

test("LineFramer", async (t) => {
  await t.test("buffers partial lines across chunks", () => {
    const framer = new LineFramer();
    assert.deepEqual(framer.push('{"Event":"Paus'), []);
    assert.deepEqual(framer.push('ed"}\r\n{"id":1'), ['{"Event":"Paused"}']);
    assert.deepEqual(framer.push(',"result":0}\n'), ['{"id":1,"result":0}']);
  });

  await t.test("trims whitespace and skips blank lines", () => {
    const framer = new LineFramer();
    assert.deepEqual(framer.push("  a \r\n\r\n\n  \nb\n"), ["a", "b"]);
  });

  await t.test("reassembles multi-byte characters split across chunks", () => {
    const framer = new LineFramer();
    const bytes = Buffer.from('{"Msg":"°"}\n', "utf8");
    const split = bytes.indexOf(0xb0);
    assert.deepEqual(framer.push(bytes.subarray(0, split)), []);
    assert.deepEqual(framer.push(bytes.subarray(split)), ['{"Msg":"°"}']);
  });

  await t.test("flush returns the unterminated rest once", () => {
    const framer = new LineFramer();
    framer.push("partial ");
    assert.equal(framer.flush(), "partial");
    assert.equal(framer.flush(), undefined);
  });

  await t.test("rejects an overlong line", () => {
    const framer = new LineFramer(8);
    assert.deepEqual(framer.push("12345678"), []);
    assert.throws(() => framer.push("9"), FramingError);
    assert.deepEqual(framer.push("ok\n"), ["ok"]);
  });
});

test("decodeMessages", async (t) => {
  await t.test("yields one value per line", async () => {
    const values = await collect(['{"Event":"Version","PHDVersion":"2.6.13"}\r\n{"jsonrpc":"2.0","result":"Guiding","id":1}\r\n']);
    assert.deepEqual(values, [
      { Event: "Version", PHDVersion: "2.6.13" },
      { jsonrpc: "2.0", result: "Guiding", id: 1 },
    ]);
  });

  await t.test("skips malformed lines and keeps going", async (t) => {
    const logs = quietConsole(t);
    const values = await collect(["{not json}\n", '{"Event":"Paused"}\n']);
    assert.deepEqual(values, [{ Event: "Paused" }]);
    assert.equal(logs.warn.mock.callCount(), 1);
    const [message] = logs.warn.mock.calls[0].arguments;
    assert.equal(typeof message, "string");
    assert.ok(String(message).startsWith("[decodeMessages] Skipping malformed message ("));
    assert.ok(String(message).endsWith("): {not json}"));
  });

  await t.test("decodes a final line without terminator", async () => {
    assert.deepEqual(await collect(['{"a":1}\n{"b":', "2}"]), [{ a: 1 }, { b: 2 }]);
  });

  await t.test("framing errors end the stream", async () => {
    await assert.rejects(collect(["x".repeat(20)], new LineFramer(10)), FramingError);
  });
});
