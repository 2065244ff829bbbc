import * as fs from "fs";
import * as path from "path";
import { isDeepStrictEqual } from "util";
import { ParseError } from "./errors";
import { ILogger } from "./interfaces/ILogger";
import { IReportParser, ParsedReport } from "./interfaces/IReportParser";
import { failuresOf } from "./ReportFormatter";

export const DEFAULT_FIXTURES_DIR = path.resolve(__dirname, "..", "fixtures");

export type Expectation = "passing" | "failing" | "malformed";

export type FixtureCheck = {
    file: string;
    expect: Expectation;
};

export const FIXTURE_CHECKS: FixtureCheck[] = [
    { file: "tempest_pass.html", expect: "passing" },
    { file: "tempest_fail.html", expect: "failing" },
    { file: "tempest_malformed.html", expect: "malformed" },
];

export type SelfTestOutcome = {
    passed: string[];
    failed: { name: string; reason: string }[];
};

/**
 * Runs the parser over the bundled fixture pages (the `--test` mode).
 */
export class SelfTest {
    constructor(
        private parser: IReportParser,
        private logger: ILogger,
        private fixturesDir: string = DEFAULT_FIXTURES_DIR,
        private checks: FixtureCheck[] = FIXTURE_CHECKS
    ) { }

    run(): SelfTestOutcome {
        const outcome: SelfTestOutcome = { passed: [], failed: [] };
        const record = (name: string, reason: string | undefined) => {
            if (reason) {
                outcome.failed.push({ name, reason });
                this.logger.error(`FAIL ${name}: ${reason}`);
            } else {
                outcome.passed.push(name);
                this.logger.log(`PASS ${name}`);
            }
        };

        for (const check of this.checks) {
            const filePath = path.join(this.fixturesDir, check.file);
            let html: string;
            try {
                html = fs.readFileSync(filePath, "utf-8");
            } catch (err) {
                record(check.file, `cannot read fixture (${err instanceof Error ? err.message : String(err)})`);
                continue;
            }

            let report: ParsedReport;
            try {
                report = this.parser.parse(html);
            } catch (err) {
                if (check.expect === "malformed" && err instanceof ParseError) {
                    record(check.file, undefined);
                } else {
                    record(check.file, `unexpected ${describe(err)}`);
                }
                continue;
            }

            record(check.file, this.verify(check.expect, report));
            record(`${check.file} (re-parse)`, this.verifyReparse(html, report));
        }

        this.logger.log(`Self-test: ${outcome.passed.length} passed, ${outcome.failed.length} failed.`);
        return outcome;
    }

    private verifyReparse(html: string, first: ParsedReport): string | undefined {
        try {
            return isDeepStrictEqual(this.parser.parse(html), first)
                ? undefined
                : "re-parsing produced a different report";
        } catch (err) {
            return `re-parse threw ${describe(err)}`;
        }
    }

    private verify(expect: Expectation, report: ParsedReport): string | undefined {
        const failures = failuresOf(report).length;
        switch (expect) {
            case "malformed":
                return "expected a ParseError but the page parsed";
            case "passing":
                if (report.summary.total === 0) return "no tests found";
                return failures === 0 ? undefined : `expected no failures, found ${failures}`;
            case "failing":
                return failures > 0 ? undefined : "expected at least one failure, found none";
        }
    }
}

function describe(err: unknown): string {
    return err instanceof Error ? `${err.name}: ${err.message}` : `error: ${String(err)}`;
}
