import { DomUtils, parseDocument } from "htmlparser2";
import { Element, isTag } from "domhandler";
import { ParseError } from "./errors";
import {
    IReportParser,
    ParsedReport,
    ReportSummary,
    TestOutcome,
    TestResult,
} from "./interfaces/IReportParser";
import { extractTraceback } from "./utils/TracebackUtils";

const STATUS_WORDS = new Map<string, TestOutcome>([
    ["pass", "PASS"],
    ["fail", "FAIL"],
    ["error", "ERROR"],
    ["skip", "SKIP"],
]);

// Class of the test-case cell, used when the status text is unusable.
const CASE_CLASSES = new Map<string, TestOutcome>([
    ["failCase", "FAIL"],
    ["errorCase", "ERROR"],
    ["skipCase", "SKIP"],
]);

// href="javascript:showTestDetail('div_ft1.1')"
const POPUP_ID_REGEX = /'([^']+)'/;

// First line of captured output: "ft1.1: package.module.Class.test_x"
const OUTPUT_NAME_REGEX = /^\s*[\w.]+:\s*(\S+\.\S+)\s*$/;

/**
 * Parses the HTML page that subunit2html renders for a stestr/Tempest run.
 *
 * Suite rows (`td.testname`) set the class path for the test rows that follow
 * them; each test row (`div.testcase`) becomes one {@link TestResult}.
 */
export class TempestHtmlParser implements IReportParser {
    parse(html: string): ParsedReport {
        const document = parseDocument(html);

        const testCaseDivs = DomUtils.findAll((el) => el.name === "div" && hasClass(el, "testcase"), document.children);
        const resultTable = DomUtils.findOne(
            (el) => el.name === "table" && DomUtils.getAttributeValue(el, "id") === "result_table",
            document.children
        );
        if (testCaseDivs.length === 0 && !resultTable) {
            throw new ParseError("No test result markers found: expected a result_table or testcase rows.");
        }

        const popups = new Map<string, Element>();
        for (const div of DomUtils.findAll((el) => el.name === "div", document.children)) {
            const id = DomUtils.getAttributeValue(div, "id");
            if (id && !popups.has(id)) popups.set(id, div);
        }

        const results: TestResult[] = [];
        const consumed = new Set<Element>();
        let suiteName: string | undefined;

        for (const row of DomUtils.findAll((el) => el.name === "tr", document.children)) {
            const suiteCell = DomUtils.findOne((el) => el.name === "td" && hasClass(el, "testname"), row.children);
            if (suiteCell) {
                suiteName = DomUtils.textContent(suiteCell).trim() || undefined;
                continue;
            }

            const testCaseDiv = DomUtils.findOne((el) => el.name === "div" && hasClass(el, "testcase"), row.children);
            if (testCaseDiv) {
                consumed.add(testCaseDiv);
                results.push(this.parseTestRow(row, testCaseDiv, suiteName, popups));
            }
        }

        // Every testcase marker must have become exactly one result.
        const stray = testCaseDivs.find((div) => !consumed.has(div));
        if (stray) {
            const testCase = DomUtils.textContent(stray).trim() || "(unnamed)";
            throw new ParseError(`Test case ${testCase} is not inside its own result row.`);
        }

        return { results, summary: summarize(results) };
    }

    private parseTestRow(
        row: Element,
        testCaseDiv: Element,
        suiteName: string | undefined,
        popups: Map<string, Element>
    ): TestResult {
        const rowId = DomUtils.getAttributeValue(row, "id");
        const testCase = DomUtils.textContent(testCaseDiv).trim();
        if (!testCase) {
            throw new ParseError(`Test row ${rowId ?? "(no id)"} has an empty test case name.`, rowId);
        }

        const popupLink = DomUtils.findOne((el) => el.name === "a" && hasClass(el, "popup_link"), row.children);
        const output = popupLink ? popupOutput(popupLink, popups) : undefined;
        const outcome = classify(row, testCaseDiv, popupLink);
        if (!outcome) {
            throw new ParseError(`Could not classify the status of test ${testCase} (row ${rowId ?? "(no id)"}).`, rowId);
        }

        const result: TestResult = { name: resolveName(testCase, suiteName, output), outcome };
        if (outcome === "FAIL" || outcome === "ERROR") {
            const traceback = extractTraceback(output);
            if (traceback) result.detail = traceback;
        } else if (outcome === "SKIP" && output?.trim()) {
            result.detail = output.trim();
        }
        return result;
    }
}

export function summarize(results: TestResult[]): ReportSummary {
    const summary: ReportSummary = { total: results.length, passed: 0, failed: 0, errored: 0, skipped: 0 };
    for (const { outcome } of results) {
        switch (outcome) {
            case "PASS":
                summary.passed++;
                break;
            case "FAIL":
                summary.failed++;
                break;
            case "ERROR":
                summary.errored++;
                break;
            case "SKIP":
                summary.skipped++;
                break;
        }
    }
    return summary;
}

function hasClass(el: Element, className: string): boolean {
    const classes = DomUtils.getAttributeValue(el, "class");
    return !!classes && classes.split(/\s+/).includes(className);
}

function classify(row: Element, testCaseDiv: Element, popupLink: Element | null): TestOutcome | undefined {
    let statusText: string | undefined;
    if (popupLink) {
        statusText = DomUtils.textContent(popupLink);
    } else {
        // <td class="..."><div class="testcase">..</div></td><td ...>pass</td>
        const cells = row.children.filter(isTag).filter((child) => child.name === "td");
        statusText = cells.length > 1 ? DomUtils.textContent(cells[1]) : undefined;
    }

    const fromText = statusText ? STATUS_WORDS.get(statusText.trim().toLowerCase()) : undefined;
    if (fromText) return fromText;

    const caseCell = testCaseDiv.parent;
    if (caseCell && isTag(caseCell)) {
        for (const [className, outcome] of CASE_CLASSES) {
            if (hasClass(caseCell, className)) return outcome;
        }
    }
    return undefined;
}

function popupOutput(link: Element, popups: Map<string, Element>): string | undefined {
    const href = DomUtils.getAttributeValue(link, "href") ?? "";
    const popupId = POPUP_ID_REGEX.exec(href)?.[1];
    const popup = popupId ? popups.get(popupId) : undefined;
    if (!popup) return undefined;

    const pre = DomUtils.findOne((el) => el.name === "pre", popup.children);
    return pre ? DomUtils.textContent(pre) : undefined;
}

function resolveName(testCase: string, suiteName: string | undefined, output: string | undefined): string {
    if (suiteName) {
        return `${suiteName}.${testCase}`;
    }

    const firstLine = output?.trim().split("\n")[0];
    const fullName = firstLine ? OUTPUT_NAME_REGEX.exec(firstLine)?.[1] : undefined;
    if (fullName) {
        return fullName.endsWith(testCase) ? fullName : `${fullName}.${testCase}`;
    }

    return testCase;
}
