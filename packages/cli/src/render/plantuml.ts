/**
 * PlantUML entity diagram renderer
 */

import { connectorFor, entityName, referencingColumns } from './shared.js';
import type { DiagramInput, RenderOptions } from './shared.js';

export function renderPlantUml(input: DiagramInput, options: RenderOptions = {}): string {
  const showTypes = options.showColumnTypes ?? true;
  const referencing = referencingColumns(input.relationships);
  const lines: string[] = ['@startuml ERD', '!theme plain', 'hide circle', 'skinparam linetype ortho'];

  if (options.title) lines.push(`title ${options.title}`);
  lines.push('');

  for (const table of input.tables) {
    const alias = entityName(table.id).toLowerCase();
    lines.push(`entity "${table.id}" as ${alias} {`);

    const keys = table.columns.filter((c) => c.isPrimaryKey);
    const rest = table.columns.filter((c) => !c.isPrimaryKey);
    const describe = (name: string, dataType: string, required: boolean, stereotype: string) => {
      const marker = required ? '* ' : '  ';
      const type = showTypes ? ` : ${dataType}` : '';
      return `  ${marker}${name}${type}${stereotype}`;
    };

    for (const column of keys) {
      lines.push(describe(column.name, column.dataType, column.mode === 'REQUIRED', ' <<PK>>'));
    }
    if (keys.length > 0 && rest.length > 0) lines.push('  --');
    for (const column of rest) {
      const isFk = column.isForeignKey || referencing.has(`${table.id}.${column.name}`);
      lines.push(describe(column.name, column.dataType, column.mode === 'REQUIRED', isFk ? ' <<FK>>' : ''));
    }
    lines.push('}', '');
  }

  for (const rel of input.relationships) {
    const source = entityName(rel.sourceTable).toLowerCase();
    const target = entityName(rel.targetTable).toLowerCase();
    lines.push(`${source} ${connectorFor(rel)} ${target} : ${rel.sourceColumn} -> ${rel.targetColumn}`);
  }

  lines.push('@enduml');
  return lines.join('\n');
}
