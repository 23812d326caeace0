import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { BuildEventKind, MessageEvent } from '../../domain/entities/OutputEvent.js';
import type { LineSource } from '../../domain/ports/ProcessExecutorPort.js';

/** 規則表以 family 名稱為 key；內建四種之外也可註冊自訂 family */
export type RuleFamily = string;

const buildEventKindSchema = z.enum(['INFO', 'ERROR', 'WARNING', 'SUCCESS', 'TASK', 'ARTIFACT']);
const defaultKindSchema = z.enum(['INFO', 'ERROR', 'WARNING', 'SUCCESS']);
const lineSourceSchema = z.enum(['stdout', 'stderr']);

const ruleSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/).optional(),
  kind: buildEventKindSchema,
  /** 只套用在某一個輸出來源 */
  source: lineSourceSchema.optional(),
  /** 以 $1..$n 改寫訊息 */
  template: z.string().optional(),
  taskNameGroup: z.number().int().positive().optional(),
  pathGroup: z.number().int().positive().optional(),
  /** 只在看過 SUCCESS 行之後才比對 */
  requiresSuccess: z.boolean().optional(),
});

const tableSchema = z.object({
  family: z.string().min(1),
  detectArtifacts: z.boolean().default(false),
  defaults: z.object({ stdout: defaultKindSchema, stderr: defaultKindSchema }),
  rules: z.array(ruleSchema),
});

const ruleFileSchema = z.object({
  artifactExtensions: z.array(z.string().regex(/^[A-Za-z0-9]+$/)),
  tables: z.array(tableSchema),
});

export type RuleDefinition = z.infer<typeof ruleSchema>;
export type RuleTableDefinition = z.input<typeof tableSchema>;
export type RuleFile = z.infer<typeof ruleFileSchema>;

export interface CompiledRule {
  id: string;
  regex: RegExp;
  kind: BuildEventKind;
  source?: LineSource;
  template?: string;
  taskNameGroup?: number;
  pathGroup?: number;
  requiresSuccess: boolean;
}

export interface CompiledRuleTable {
  family: RuleFamily;
  rules: readonly CompiledRule[];
  defaults: Readonly<Record<LineSource, MessageEvent['kind']>>;
}

export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../../../rules/classification.json', import.meta.url),
);

/** 比對「以已知二進位副檔名結尾的路徑」的規則 */
export function artifactRule(extensions: readonly string[]): CompiledRule {
  const alternatives = extensions.map((ext) => ext.toLowerCase()).join('|');
  return {
    id: 'artifact',
    regex: new RegExp(`((?:[A-Za-z]:)?[^\\s'"\`()]*[\\w-]\\.(?:${alternatives}))(?=$|[\\s'"\`),;:])`),
    kind: 'ARTIFACT',
    pathGroup: 1,
    requiresSuccess: true,
  };
}

export function compileRuleTable(
  definition: RuleTableDefinition,
  artifactExtensions: readonly string[] = [],
): CompiledRuleTable {
  const table = tableSchema.parse(definition);
  const rules: CompiledRule[] = table.rules.map((rule) => {
    let regex: RegExp;
    try {
      regex = new RegExp(rule.pattern, rule.flags ?? '');
    } catch (err) {
      throw new Error(`Invalid pattern in rule ${table.family}/${rule.id}: ${rule.pattern}`, { cause: err });
    }
    return {
      id: rule.id,
      regex,
      kind: rule.kind,
      source: rule.source,
      template: rule.template,
      taskNameGroup: rule.taskNameGroup,
      pathGroup: rule.pathGroup,
      requiresSuccess: rule.requiresSuccess ?? false,
    };
  });

  // 產出物規則放最前面：成功之後出現的路徑優先視為 ARTIFACT
  if (table.detectArtifacts && artifactExtensions.length > 0) {
    rules.unshift(artifactRule(artifactExtensions));
  }

  return { family: table.family, rules, defaults: table.defaults };
}

export function parseRuleFile(raw: unknown): CompiledRuleTable[] {
  return compileRuleFile(ruleFileSchema.parse(raw));
}

function compileRuleFile(file: RuleFile): CompiledRuleTable[] {
  return file.tables.map((table) => compileRuleTable(table, file.artifactExtensions));
}

export function loadRuleFile(filePath: string = DEFAULT_RULES_PATH): RuleFile {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return ruleFileSchema.parse(raw);
}

export function loadRuleTables(filePath: string = DEFAULT_RULES_PATH): CompiledRuleTable[] {
  return compileRuleFile(loadRuleFile(filePath));
}

let cachedFile: RuleFile | undefined;
let cachedDefaults: CompiledRuleTable[] | undefined;

function defaultRuleFile(): RuleFile {
  cachedFile ??= loadRuleFile();
  return cachedFile;
}

/** 內建規則表（讀一次後快取） */
export function defaultRuleTables(): CompiledRuleTable[] {
  cachedDefaults ??= compileRuleFile(defaultRuleFile());
  return cachedDefaults;
}

/** 規則檔中的產出物副檔名（不含點） */
export function defaultArtifactExtensions(): readonly string[] {
  return defaultRuleFile().artifactExtensions;
}
