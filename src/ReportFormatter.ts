import { ParsedReport, TestResult } from "./interfaces/IReportParser";
import { OutputFormat } from "./interfaces/RunOptions";

export const SEPARATOR = "=".repeat(107);

export function failuresOf(report: ParsedReport): TestResult[] {
    return report.results.filter((r) => r.outcome === "FAIL" || r.outcome === "ERROR");
}

export function formatReport(report: ParsedReport, format: OutputFormat): string {
    return format === "json" ? formatJson(report) : formatText(report);
}

export function formatText(report: ParsedReport): string {
    const { total, passed, failed, errored, skipped } = report.summary;
    const lines = [
        `Parsed ${total} tests: ${passed} passed, ${failed} failed, ${errored} errored, ${skipped} skipped`,
    ];

    const failures = failuresOf(report);
    if (failures.length === 0) {
        lines.push("No failed tests found.");
        return lines.join("\n");
    }

    lines.push(`Found ${failures.length} failed tests:`);
    for (const failure of failures) {
        lines.push(SEPARATOR);
        lines.push(`${failure.outcome === "ERROR" ? "ERROR" : "TEST"}: ${failure.name}`);
        lines.push(failure.detail ?? "No traceback found");
    }
    return lines.join("\n");
}

export function formatJson(report: ParsedReport): string {
    return JSON.stringify({ summary: report.summary, results: report.results }, null, 2);
}
