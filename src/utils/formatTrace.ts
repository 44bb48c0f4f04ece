import type { NodeRecord } from '../chain/types';
import { ExecutionTrace } from './ExecutionTrace';

export const ENTRY_SEPARATOR = '\n\n====================\n\n';

function formatRecord(record: NodeRecord): string {
  const duration = `${Math.round(record.durationMs)}ms`;

  if (record.classification === 'static') {
    return (
      `--- Step: [[${record.nodeId}]] (Static, level ${record.level}, ${duration}) ---\n\n` +
      `CONTENT USED DIRECTLY:\n---\n${record.value ?? ''}\n---\n`
    );
  }

  let entry =
    `--- Step: [[${record.nodeId}]] (level ${record.level}, ${duration}) ---\n\n` +
    `PROMPT SENT TO LLM:\n---\n${record.prompt ?? ''}\n---\n\n`;

  if (record.error) {
    entry += `ERROR:\n---\n${record.error.message}\n---\n`;
  } else {
    entry += `RESPONSE RECEIVED:\n---\n${record.value ?? ''}\n---\n`;
  }
  return entry;
}

/**
 * Renders the prompt/response log of a run, ordered by level and then by declaration order.
 */
export function formatTrace(trace: ExecutionTrace): string {
  const order = new Map(trace.levels.flat().map((nodeId, index): [string, number] => [nodeId, index]));
  const rank = (record: NodeRecord) => order.get(record.nodeId) ?? Number.MAX_SAFE_INTEGER;

  const entries = [...trace.records].sort((a, b) => a.level - b.level || rank(a) - rank(b)).map(formatRecord);

  const failures = trace.failures();
  if (failures.length > 0) {
    entries.push(
      `--- Run ${trace.runId} failed ---\n\n` +
        failures.map((record) => `[[${record.nodeId}]]: ${record.error?.message ?? 'unknown error'}`).join('\n') +
        '\n'
    );
  }

  return entries.join(ENTRY_SEPARATOR);
}
