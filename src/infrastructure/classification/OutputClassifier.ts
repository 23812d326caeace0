import {
  artifactEvent,
  messageEvent,
  taskEvent,
  type OutputEvent,
} from '../../domain/entities/OutputEvent.js';
import { InvalidOperationError } from '../../domain/errors/DomainErrors.js';
import type { LineSource } from '../../domain/ports/ProcessExecutorPort.js';
import { stripAnsi } from '../../shared/text.js';
import {
  compileRuleTable,
  defaultRuleTables,
  type CompiledRuleTable,
  type RuleFamily,
  type RuleTableDefinition,
} from './RuleTable.js';

export interface ClassifyContext {
  /** 預設 stdout */
  source?: LineSource;
  /** 同一次執行中已出現過 SUCCESS 行 */
  afterSuccess?: boolean;
  timestamp?: number;
}

/**
 * 以單一規則表分類一行輸出（純函式）
 *
 * 先去掉 ANSI，依序比對；第一條命中的規則決定 kind 與訊息。
 * 沒有規則命中時採用該來源的預設 kind。
 */
export function classifyLine(
  line: string,
  table: CompiledRuleTable,
  context: ClassifyContext = {},
): OutputEvent {
  const source = context.source ?? 'stdout';
  const text = stripAnsi(line).trimEnd();
  const opts = { timestamp: context.timestamp };

  for (const rule of table.rules) {
    if (rule.source && rule.source !== source) continue;
    if (rule.requiresSuccess && !context.afterSuccess) continue;

    const match = rule.regex.exec(text);
    if (!match) continue;

    const message = rule.template ? expandTemplate(rule.template, match) : text;
    switch (rule.kind) {
      case 'TASK':
        return taskEvent(message, group(match, rule.taskNameGroup), opts);
      case 'ARTIFACT': {
        const artifactPath = group(match, rule.pathGroup) ?? match[0];
        return artifactEvent(message, artifactPath, undefined, opts);
      }
      default:
        return messageEvent(rule.kind, message, opts);
    }
  }

  return messageEvent(table.defaults[source], text, opts);
}

function group(match: RegExpExecArray, index: number | undefined): string | undefined {
  if (index === undefined) return undefined;
  return match[index];
}

function expandTemplate(template: string, match: RegExpExecArray): string {
  return template.replace(/\$(\d+)/g, (_, n: string) => match[Number(n)] ?? '');
}

/**
 * 規則表登錄處
 *
 * 新增工具鏈家族只要 registerRuleTable()，分類邏輯本身不變。
 */
export class OutputClassifier {
  private readonly tables = new Map<RuleFamily, CompiledRuleTable>();

  constructor(tables: Iterable<CompiledRuleTable> = defaultRuleTables()) {
    for (const table of tables) this.tables.set(table.family, table);
  }

  /** 同名 family 會被覆蓋 */
  registerRuleTable(table: CompiledRuleTable): void {
    this.tables.set(table.family, table);
  }

  registerRuleDefinition(definition: RuleTableDefinition, artifactExtensions?: readonly string[]): void {
    this.registerRuleTable(compileRuleTable(definition, artifactExtensions));
  }

  hasFamily(family: RuleFamily): boolean {
    return this.tables.has(family);
  }

  families(): RuleFamily[] {
    return [...this.tables.keys()];
  }

  classify(line: string, family: RuleFamily, context?: ClassifyContext): OutputEvent {
    const table = this.tables.get(family);
    if (!table) {
      throw new InvalidOperationError(`No rule table registered for family: ${family}`);
    }
    return classifyLine(line, table, context);
  }
}

