import type { CallSite } from '../traceParser/types';
import { TraceStructureError } from '../../utils/error';
import { ROOT_ID } from './types';
import type { CallForest, CallNode, CallNodeId } from './types';

export function createForest(): CallForest {
  return { nodes: [{ id: ROOT_ID, duration: 0, parent: null, children: [] }], roots: [] };
}

export function getNode(forest: CallForest, id: CallNodeId): CallNode {
  const node = forest.nodes[id];
  if (!node) throw new TraceStructureError(`Unknown call node #${id}`);
  return node;
}

export function lastChild(forest: CallForest, id: CallNodeId): CallNodeId | undefined {
  const { children } = getNode(forest, id);
  return children.length ? children[children.length - 1] : undefined;
}

/**
 * Append a call under `parent` and add its duration to every ancestor,
 * sentinel included.
 */
export function addCall(forest: CallForest, site: CallSite, duration: number, parent: CallNodeId): CallNode {
  const parentNode = getNode(forest, parent);
  const node: CallNode = { id: forest.nodes.length, site, duration, parent, children: [] };
  forest.nodes.push(node);
  parentNode.children.push(node.id);
  if (parent === ROOT_ID) forest.roots.push(node.id);

  let ancestor: CallNodeId | null = parent;
  while (ancestor !== null) {
    const n = getNode(forest, ancestor);
    n.duration += duration;
    ancestor = n.parent;
  }
  return node;
}

export function callCount(forest: CallForest): number {
  return forest.nodes.length - 1;
}

export function wholeDuration(forest: CallForest): number {
  return forest.roots.reduce((sum, id) => sum + getNode(forest, id).duration, 0);
}
