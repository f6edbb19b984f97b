// JsonLinesDriver: process executors that report samples as JSON lines
import { FileTail } from '../utils/FileTail.js';

import { ProcessDriver } from './ProcessDriver.js';
import { parseSampleLine } from './samples.js';
import type { Sample } from './types.js';

export abstract class JsonLinesDriver extends ProcessDriver {
  private tail: FileTail | null = null;

  /**
   * File the tool appends sample lines to; may be the driver's own stdout.
   */
  protected abstract samplesPath(): string;

  protected async collectSamples(final: boolean): Promise<Sample[]> {
    if (!this.tail) {
      this.tail = new FileTail(this.samplesPath());
    }
    const lines = await this.tail.readLines(final);
    return lines.flatMap(line => parseSampleLine(line, this.executorId));
  }
}
