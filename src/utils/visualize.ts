import { DependencyGraph } from '../chain/DependencyGraph';

/**
 * Renders the execution plan, one block per level, for debug output.
 */
export function describePlan(graph: DependencyGraph, options: { color?: boolean } = {}): string {
  const color = options.color ?? true;
  const paint = (code: string, text: string) => (color ? `\x1b[${code}m${text}\x1b[0m` : text);

  let visualization = paint('1;36', 'Chain Execution Plan:') + '\n';

  graph.levels.forEach((level, index) => {
    visualization += `\n${paint('1;33', `Level ${index}:`)}\n`;
    level.forEach((nodeId) => {
      const classification = graph.classify(nodeId);
      const dependencies = graph.dependenciesOf(nodeId);

      // static nodes never reach the generator
      const classificationColor = classification === 'static' ? '32' : '35';

      visualization += `  • ${paint('1', nodeId)} [${paint(classificationColor, classification)}]`;
      if (dependencies.length > 0) {
        visualization += ` ${paint('90', `(depends on: ${dependencies.join(', ')})`)}`;
      }
      visualization += '\n';
    });
  });

  const dead = graph.nodes.filter((nodeId) => !graph.isReachable(nodeId));
  if (dead.length > 0) {
    visualization += `\n${paint('90', `Unreferenced (not dispatched): ${dead.join(', ')}`)}\n`;
  }

  return visualization;
}
