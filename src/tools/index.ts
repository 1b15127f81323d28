import { analysisTools } from './analysis.js';
import { cargoTools } from './cargo.js';
import { lifecycleTools } from './lifecycle.js';
import { navigationTools } from './navigation.js';
import { refactoringTools } from './refactoring.js';
import { ToolRegistry } from './registry.js';

export { ToolRegistry, type ToolContext } from './registry.js';

export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry([
    ...navigationTools,
    ...analysisTools,
    ...refactoringTools,
    ...cargoTools,
    ...lifecycleTools,
  ]);
}
