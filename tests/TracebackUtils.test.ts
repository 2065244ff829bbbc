import { test } from 'node:test';
import * as assert from 'assert';
import { extractTraceback } from '../src/utils/TracebackUtils';

test("extractTraceback: drops the header line before the traceback", () => {
    const text = [
        "ft1.1: pkg.module.Class.test_a",
        "Traceback (most recent call last):",
        '  File "/srv/pkg/module.py", line 12, in test_a',
        "    self.assertTrue(False)",
        "AssertionError: False is not true",
        "",
    ].join("\n");

    assert.strictEqual(
        extractTraceback(text),
        [
            "Traceback (most recent call last):",
            '  File "/srv/pkg/module.py", line 12, in test_a',
            "    self.assertTrue(False)",
            "AssertionError: False is not true",
        ].join("\n")
    );
});

test("extractTraceback: accepts a Traceback line followed by an unindented File line", () => {
    const text = "captured:\nTraceback of call\nFile x.py, line 3\nValueError";
    assert.strictEqual(extractTraceback(text), "Traceback of call\nFile x.py, line 3\nValueError");
});

test("extractTraceback: returns the whole output when there is no traceback", () => {
    assert.strictEqual(extractTraceback("  \n  Timed out after 300 seconds\n "), "Timed out after 300 seconds");
    assert.strictEqual(extractTraceback("Traceback missing\nno file here"), "Traceback missing\nno file here");
});

test("extractTraceback: empty output gives undefined", () => {
    assert.strictEqual(extractTraceback(undefined), undefined);
    assert.strictEqual(extractTraceback(""), undefined);
    assert.strictEqual(extractTraceback("   \n  "), undefined);
});
