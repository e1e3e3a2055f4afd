import type { RawEvent } from '../traceParser/types';
import { TraceStructureError } from '../../utils/error';
import { addCall, createForest, getNode, lastChild } from './forest';
import { frameChain, resolveAttachment } from './resolve';
import { ROOT_ID } from './types';
import type { CallForest, CallNodeId } from './types';

// The last event has nothing after it to measure against
export const TRAILING_CALL_DURATION = 1e-6;

// Depth the producer assigns to top-level commands
const BASELINE_DEPTH = 1;

function where(event: RawEvent): string {
  return `${event.site.file}(${event.site.line})`;
}

function ascend(forest: CallForest, from: CallNodeId, levels: number, event: RawEvent): CallNodeId {
  let id = from;
  for (let i = 0; i < levels; i++) {
    const parent = getNode(forest, id).parent;
    if (parent === null) {
      throw new TraceStructureError(`Call nesting drops below the top level at ${where(event)}`);
    }
    id = parent;
  }
  return id;
}

/**
 * Place the call for `event` relative to the cursor (the parent of the
 * previously placed call) and return the new cursor.
 */
function placeCall(
  forest: CallForest,
  cursor: CallNodeId,
  event: RawEvent,
  previousDepth: number,
  elapsed: number
): CallNodeId {
  const duration = Math.max(0, elapsed);
  let parent: CallNodeId;

  if (event.depth === undefined) {
    parent = resolveAttachment(frameChain(forest, cursor), event.site);
  } else {
    const diff = event.depth - previousDepth;
    if (diff > 1) {
      throw new TraceStructureError(`Call nesting increased by ${diff} levels at ${where(event)}`);
    }
    if (diff === 1) {
      const previous = lastChild(forest, cursor);
      if (previous === undefined) {
        throw new TraceStructureError(`Call nesting increased without an enclosing call at ${where(event)}`);
      }
      parent = previous;
    } else {
      parent = ascend(forest, cursor, -diff, event);
    }
  }

  addCall(forest, event.site, duration, parent);
  return parent;
}

/**
 * Rebuild the call forest from a trace's events.
 * Each call's own time runs from its timestamp to the next event's.
 * Throws TraceStructureError when the nesting cannot be a call stack.
 */
export function buildCallForest(events: Iterable<RawEvent>): CallForest {
  const forest = createForest();
  let cursor: CallNodeId = ROOT_ID;
  let previousDepth = BASELINE_DEPTH;
  let pending: RawEvent | undefined;

  for (const event of events) {
    if (pending) {
      cursor = placeCall(forest, cursor, pending, previousDepth, event.timestamp - pending.timestamp);
      if (pending.depth !== undefined) previousDepth = pending.depth;
    }
    pending = event;
  }
  if (pending) {
    // the last call stays at the level of the call before it
    const trailing = pending.depth === undefined ? pending : { ...pending, depth: previousDepth };
    placeCall(forest, cursor, trailing, previousDepth, TRAILING_CALL_DURATION);
  }
  return forest;
}
