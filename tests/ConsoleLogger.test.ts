import { test } from 'node:test';
import * as assert from 'assert';
import { ConsoleLogger, describeError } from '../src/ConsoleLogger';

test("ConsoleLogger: redacts messages before writing them", (t) => {
    const log = t.mock.method(console, 'log', () => undefined);
    const warn = t.mock.method(console, 'warn', () => undefined);

    const logger = new ConsoleLogger();
    logger.log("Downloading from URL: https://logs.example.com/r.html?token=test-secret");
    logger.warn("Request failed", "Cookie: session=test-secret");

    assert.deepStrictEqual(log.mock.calls.map((c) => c.arguments), [
        ["Downloading from URL: https://logs.example.com/r.html?token=***REDACTED***"]
    ]);
    assert.deepStrictEqual(warn.mock.calls.map((c) => c.arguments), [
        ["Request failed", "Cookie: ***REDACTED***"]
    ]);
});

test("ConsoleLogger: logToStderr keeps stdout free for JSON output", (t) => {
    const log = t.mock.method(console, 'log', () => undefined);
    const error = t.mock.method(console, 'error', () => undefined);

    new ConsoleLogger({ logToStderr: true }).log("Reading local file: r.html");

    assert.strictEqual(log.mock.callCount(), 0);
    assert.deepStrictEqual(error.mock.calls.map((c) => c.arguments), [["Reading local file: r.html"]]);
});

test("describeError: strings, errors and other values", () => {
    const err = new Error("boom");
    err.stack = "Error: boom\n    at here";

    assert.strictEqual(describeError("plain"), "plain");
    assert.strictEqual(describeError(err), "Error: boom\n    at here");
    assert.strictEqual(describeError({ code: 7 }), '{"code":7}');
});
