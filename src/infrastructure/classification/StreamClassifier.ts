import type { OutputEvent } from '../../domain/entities/OutputEvent.js';
import type { RawLine } from '../../domain/ports/ProcessExecutorPort.js';
import type { OutputClassifier } from './OutputClassifier.js';
import type { RuleFamily } from './RuleTable.js';

export interface RunSummary {
  errors: string[];
  warnings: string[];
  sawSuccess: boolean;
}

/**
 * 一次執行的分類狀態
 *
 * 記住是否已出現 SUCCESS（ARTIFACT 規則需要），並累積 structured errors / warnings。
 */
export class StreamClassifier {
  private afterSuccess = false;
  private readonly errors: string[] = [];
  private readonly warnings: string[] = [];

  constructor(
    private readonly classifier: OutputClassifier,
    private readonly family: RuleFamily,
  ) {}

  next(line: RawLine): OutputEvent {
    const event = this.classifier.classify(line.text, this.family, {
      source: line.source,
      afterSuccess: this.afterSuccess,
    });
    this.record(event);
    return event;
  }

  private record(event: OutputEvent): void {
    if (event.kind === 'SUCCESS') this.afterSuccess = true;
    this.errors.push(...event.structuredErrors);
    this.warnings.push(...event.structuredWarnings);
  }

  get errorCount(): number {
    return this.errors.length;
  }

  summary(): RunSummary {
    return {
      errors: [...this.errors],
      warnings: [...this.warnings],
      sawSuccess: this.afterSuccess,
    };
  }
}
