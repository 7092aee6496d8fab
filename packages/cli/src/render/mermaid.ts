/**
 * Mermaid erDiagram renderer
 */

import { connectorFor, entityName, referencingColumns } from './shared.js';
import type { DiagramInput, RenderOptions } from './shared.js';

function attributeType(dataType: string): string {
  const cleaned = dataType.toLowerCase().replace(/[^a-z0-9_]/g, '_');
  return cleaned || 'unknown';
}

export function renderMermaid(input: DiagramInput, options: RenderOptions = {}): string {
  const showTypes = options.showColumnTypes ?? true;
  const referencing = referencingColumns(input.relationships);
  const lines: string[] = [];

  if (options.title) {
    lines.push('---', `title: ${options.title}`, '---');
  }
  lines.push('erDiagram');

  for (const table of input.tables) {
    lines.push(`    ${entityName(table.id)} {`);
    for (const column of table.columns) {
      const keys: string[] = [];
      if (column.isPrimaryKey) keys.push('PK');
      if (column.isForeignKey || referencing.has(`${table.id}.${column.name}`)) keys.push('FK');

      // Mermaid attributes always need a type
      const type = showTypes ? attributeType(column.dataType) : 'field';
      let line = `        ${type} ${column.name}`;
      if (keys.length > 0) line += ` ${keys.join(', ')}`;
      if (column.mode === 'REQUIRED') line += ' "NOT NULL"';
      lines.push(line);
    }
    lines.push('    }');
  }

  for (const rel of input.relationships) {
    lines.push(
      `    ${entityName(rel.sourceTable)} ${connectorFor(rel)} ${entityName(rel.targetTable)} : "${rel.sourceColumn} -> ${rel.targetColumn}"`
    );
  }

  return lines.join('\n');
}
