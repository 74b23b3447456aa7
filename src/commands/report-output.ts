export interface ReportOutput {
  write(lines: string[]): void;
}

export const REPORT_OUTPUT = 'REPORT_OUTPUT';

export class StdoutReportOutput implements ReportOutput {
  write(lines: string[]): void {
    if (lines.length === 0) return;
    process.stdout.write(`${lines.join('\n')}\n`);
  }
}
