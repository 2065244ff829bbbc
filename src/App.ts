import { ReportError } from "./errors";
import { ILogger } from "./interfaces/ILogger";
import { IReportLoader } from "./interfaces/IReportLoader";
import { IReportParser, ParsedReport } from "./interfaces/IReportParser";
import { RunOptions } from "./interfaces/RunOptions";
import { failuresOf, formatReport } from "./ReportFormatter";
import { SelfTest } from "./SelfTest";

export const EXIT_OK = 0;
export const EXIT_TEST_FAILURES = 1;
export const EXIT_ERROR = 2;

export type ReportWriter = (text: string) => void;

export class App {
    constructor(
        private loader: IReportLoader,
        private parser: IReportParser,
        private logger: ILogger,
        private write: ReportWriter = (text) => process.stdout.write(`${text}\n`)
    ) { }

    /** Loads, parses and prints one report; resolves to the process exit code. */
    async run(options: RunOptions): Promise<number> {
        let report: ParsedReport;
        try {
            const html = await this.loader.load(options.source);
            report = this.parser.parse(html);
        } catch (err) {
            if (err instanceof ReportError) {
                this.logger.error(`Error: ${err.message}`);
                return EXIT_ERROR;
            }
            throw err;
        }

        this.write(formatReport(report, options.format));
        return failuresOf(report).length > 0 ? EXIT_TEST_FAILURES : EXIT_OK;
    }

    runSelfTest(selfTest: SelfTest = new SelfTest(this.parser, this.logger)): number {
        const outcome = selfTest.run();
        return outcome.failed.length > 0 ? EXIT_TEST_FAILURES : EXIT_OK;
    }
}
