/**
 * API Autogenerator
 * Renders the frontend model declarations of every registered API model
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createChildLogger } from '@kendb/shared';
import type { StoredModelClass } from '../model.js';
import type { ModelRegistry } from '../registry.js';
import type { FieldMeta } from '../types.js';
import type { Autogenerator } from './autogenerators.js';

const INDENT = '    ';

export interface ApiAutogeneratorOptions {
  outputPath: string;
  /** Shown in the header comment */
  generatorName?: string;
  now?: () => Date;
}

interface RelationLink {
  model: string;
  joined: string;
  raw: string;
  target: string;
}

/**
 * Strip the common indentation of a documentation string. The first line is
 * not considered, since it usually follows the opening quote.
 */
export function cleanDoc(doc: string): string[] {
  const lines = doc.split('\n').map((line) => line.trimEnd());
  const [first = '', ...rest] = lines;
  const indents = rest.filter((line) => line !== '').map((line) => line.length - line.trimStart().length);
  const margin = indents.length > 0 ? Math.min(...indents) : 0;

  const cleaned = [first.trimStart(), ...rest.map((line) => line.slice(margin))];
  while (cleaned.length > 0 && cleaned[0] === '') {
    cleaned.shift();
  }
  while (cleaned.length > 0 && cleaned[cleaned.length - 1] === '') {
    cleaned.pop();
  }
  return cleaned;
}

function jsdoc(lines: readonly string[], indent = ''): string[] {
  return [
    `${indent}/**`,
    ...lines.map((line) => (line === '' ? `${indent} *` : `${indent} * ${line.replaceAll('*/', '*\\/')}`)),
    `${indent} */`,
  ];
}

function quote(value: string): string {
  return `'${value.replaceAll('\\', '\\\\').replaceAll("'", "\\'")}'`;
}

function header(generator: string, date: string): string[] {
  return [
    '/*',
    ' * THIS IS AN AUTOGENERATED FILE',
    ' * Do not commit this file to version control.',
    ` * Generator: ${generator}`,
    ` * Generated at: ${date}`,
    ' *',
    ' * Model class declarations for api_lib.ts',
    ' */',
    '',
    'import {',
    `${INDENT}ModelBase,`,
    `${INDENT}ModelManager,`,
    `${INDENT}Status,`,
    `${INDENT}linkRelation,`,
    `${INDENT}manageModel,`,
    "} from './api_lib';",
    "import { getInjection } from './common';",
    '',
    ...jsdoc([
      'Create a ModelManager and store it in modelClass.objects.',
      '',
      'Request URL is generated based on provided API model name.',
      '',
      '@param modelClass model class',
      '@param modelAPIName model name to use in download URL',
    ]),
    'function autogenManagerModel<Model extends ModelBase>(',
    `${INDENT}modelClass: new(id: number) => Model,`,
    `${INDENT}modelAPIName: string,`,
    '): void {',
    `${INDENT}const template = getInjection<string>('dataman-endpoint');`,
    `${INDENT}const path = template.replace('MODEL_NAME', modelAPIName);`,
    `${INDENT}manageModel(modelClass, new URL(path, window.location.origin));`,
    '}',
  ];
}

export class ApiAutogenerator implements Autogenerator {
  readonly name = 'api-models';
  private readonly logger = createChildLogger({ component: 'ApiAutogenerator' });
  private readonly registry: ModelRegistry;
  private readonly options: ApiAutogeneratorOptions;

  constructor(registry: ModelRegistry, options: ApiAutogeneratorOptions) {
    this.registry = registry;
    this.options = options;
  }

  render(): string {
    const now = this.options.now ?? (() => new Date());
    const lines = header(this.options.generatorName ?? '@kendb/api-fields', now().toISOString());
    const links: RelationLink[] = [];

    for (const model of this.registry.models()) {
      lines.push('', ...this.renderModel(model, links));
    }

    if (links.length > 0) {
      lines.push('');
      for (const link of links) {
        lines.push(`linkRelation(${link.model}, ${quote(link.joined)}, ${quote(link.raw)}, ${link.target});`);
      }
    }

    return `${lines.join('\n')}\n`;
  }

  async run(): Promise<void> {
    await this.write(this.options.outputPath);
  }

  async write(path: string): Promise<void> {
    const content = this.render();
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
    this.logger.info({ path, models: this.registry.size }, 'Model declarations written');
  }

  private renderModel(model: StoredModelClass, links: RelationLink[]): string[] {
    const api = model.api;
    const doc = model.doc ?? `${model.name}(${['id', ...api.allFields].join(', ')})`;
    const groups = [...api.fieldGroups.keys()];

    return [
      ...jsdoc(cleanDoc(doc)),
      `export class ${model.name} extends ModelBase {`,
      ...jsdoc(["This model's ModelManager."], INDENT),
      `${INDENT}static objects: ModelManager<${model.name}>;`,
      '',
      `${INDENT}static readonly fieldGroups: readonly string[] = [${groups.map(quote).join(', ')}];`,
      '',
      ...api.allFields.flatMap((name) => this.renderField(model, name, links)),
      '',
      ...groups.map((group) => `${INDENT}private ${quote(`_fields_${group}`)}: Status = Status.NotRequested;`),
      '}',
      `autogenManagerModel(${model.name}, ${quote(api.apiName)});`,
    ];
  }

  private renderField(model: StoredModelClass, name: string, links: RelationLink[]): string[] {
    const relation = this.fieldMeta(model, name)?.relation;
    const target = relation?.target?.();
    const opaque = [`${INDENT}${name}: unknown = null;`];
    if (relation === undefined || target === undefined || !this.registry.has(target)) {
      return opaque;
    }

    const single = relation.kind === 'foreign-key' || relation.kind === 'one-to-one';
    const suffix = single ? '_id' : '_ids';
    if (!(single || relation.kind === 'to-many') || !name.endsWith(suffix)) {
      return opaque;
    }
    const joined = name.slice(0, -suffix.length);
    if (joined === '' || model.api.allFields.includes(joined)) {
      return opaque;
    }

    links.push({ model: model.name, joined, raw: name, target: target.name });
    return single
      ? [`${INDENT}${name}: number | null = null;`, `${INDENT}declare ${joined}: ${target.name} | null;`]
      : [`${INDENT}${name}: number[] = [];`, `${INDENT}declare ${joined}: ${target.name}[];`];
  }

  private fieldMeta(model: StoredModelClass, name: string): FieldMeta | undefined {
    for (const fields of model.api.fieldGroups.values()) {
      const field = fields.find((candidate) => candidate.name === name);
      if (field !== undefined) {
        return field;
      }
    }
    return undefined;
  }
}
