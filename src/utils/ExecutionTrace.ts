import EventEmitter from 'eventemitter3';
import { v4 as uuid4 } from 'uuid';
import type { NodeFailure } from '../errors';
import type { NodeRecord, NodeState } from '../chain/types';

export type TraceEvents = {
  level: [index: number, nodeIds: string[]];
  state: [nodeId: string, state: NodeState];
  record: [record: NodeRecord];
  failed: [failures: NodeFailure[]];
};

/**
 * Append-only record of a run, owned by the caller and handed to the resolver.
 * Listeners get every event as it happens; `records` keeps them for later formatting.
 */
export class ExecutionTrace extends EventEmitter<TraceEvents> {
  public readonly runId: string = uuid4();
  public readonly startedAt: number = Date.now();

  private readonly entries: NodeRecord[] = [];
  private readonly byNode = new Map<string, NodeRecord>();
  private readonly groups: string[][] = [];

  get records(): readonly NodeRecord[] {
    return this.entries;
  }

  get levels(): readonly (readonly string[])[] {
    return this.groups;
  }

  beginLevel(index: number, nodeIds: string[]): void {
    this.groups[index] = [...nodeIds];
    this.emit('level', index, nodeIds);
  }

  transition(nodeId: string, state: NodeState): void {
    this.emit('state', nodeId, state);
  }

  append(record: NodeRecord): void {
    if (this.byNode.has(record.nodeId)) {
      throw new Error(`Node [[${record.nodeId}]] already has a trace record`);
    }
    const entry = Object.freeze({ ...record });
    this.entries.push(entry);
    this.byNode.set(record.nodeId, entry);
    this.emit('record', record);
  }

  fail(failures: NodeFailure[]): void {
    this.emit('failed', failures);
  }

  recordFor(nodeId: string): NodeRecord | undefined {
    return this.byNode.get(nodeId);
  }

  failures(): NodeRecord[] {
    return this.entries.filter((entry) => entry.error !== undefined);
  }
}
