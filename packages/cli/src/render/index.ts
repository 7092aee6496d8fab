import type { DiagramFormat } from '../config.js';
import { renderMermaid } from './mermaid.js';
import { renderPlantUml } from './plantuml.js';
import type { DiagramInput, RenderOptions } from './shared.js';

export { renderMermaid } from './mermaid.js';
export { renderPlantUml } from './plantuml.js';
export { KIND_CONNECTORS, entityName } from './shared.js';
export type { DiagramInput, RenderOptions } from './shared.js';

export function renderDiagram(format: DiagramFormat, input: DiagramInput, options?: RenderOptions): string {
  switch (format) {
    case 'mermaid':
      return renderMermaid(input, options);
    case 'plantuml':
      return renderPlantUml(input, options);
    default: {
      const exhaustive: never = format;
      throw new Error(`Unsupported diagram format: ${String(exhaustive)}`);
    }
  }
}
