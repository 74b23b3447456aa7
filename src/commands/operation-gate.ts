import { createInterface } from 'node:readline/promises';
import { setTimeout as sleep } from 'node:timers/promises';

/** Holds an adhoc diff between its begin and end capture. */
export interface OperationGate {
  wait(): Promise<void>;
}

export const OPERATION_GATE = 'OPERATION_GATE';

export class IntervalGate implements OperationGate {
  constructor(private readonly intervalMs: number) {}

  async wait(): Promise<void> {
    await sleep(this.intervalMs);
  }
}

export class EnterKeyGate implements OperationGate {
  async wait(): Promise<void> {
    const prompt = createInterface({ input: process.stdin, output: process.stderr });
    try {
      await prompt.question('Begin capture done. Run the operation, then press Enter for the end capture. ');
    } finally {
      prompt.close();
    }
  }
}
