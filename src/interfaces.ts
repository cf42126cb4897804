/**
 * Interfaces of the known collection backends and the datatype each one
 * writes. Interface names outside this table are accepted; they simply get
 * no startup check.
 */

import type { Datatype } from './records/types.js';

export interface InterfaceInfo {
  readonly name: string;
  readonly datatype: Datatype;
  readonly description: string;
}

export const KNOWN_INTERFACES: readonly InterfaceInfo[] = [
  { name: 'cpusched', datatype: 'event', description: 'CPU scheduler switches and wakeups' },
  { name: 'ipc', datatype: 'event', description: 'Inter-process communication over TCP' },
  { name: 'memevents', datatype: 'event', description: 'Memory allocation and free events' },
  { name: 'diskblockrq', datatype: 'event', description: 'Disk block requests' },
  { name: 'disklat', datatype: 'point', description: 'Disk latency samples' },
  { name: 'memtime', datatype: 'point', description: 'Memory usage per process over time' },
  { name: 'callstack', datatype: 'stack', description: 'Sampled call stacks' },
  { name: 'lib', datatype: 'stack', description: 'Library load times' },
  { name: 'mallocstacks', datatype: 'stack', description: 'Call stacks of memory allocations' },
  { name: 'memleak', datatype: 'stack', description: 'Call stacks of unreleased allocations' },
  { name: 'perf_malloc', datatype: 'stack', description: 'Allocation call stacks sampled by perf' },
];

const BY_NAME: ReadonlyMap<string, InterfaceInfo> = new Map(KNOWN_INTERFACES.map(info => [info.name, info]));

export function findInterface(name: string): InterfaceInfo | undefined {
  return BY_NAME.get(name);
}

/**
 * The datatype a known interface writes, or undefined for an unknown one.
 */
export function interfaceDatatype(name: string): Datatype | undefined {
  return findInterface(name)?.datatype;
}
