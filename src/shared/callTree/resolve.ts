import type { CallSite } from '../traceParser/types';
import { TraceStructureError } from '../../utils/error';
import { getNode, lastChild } from './forest';
import type { CallForest, CallNodeId, Frame } from './types';

/**
 * Active frames from the innermost call (the cursor's last child, or the
 * cursor itself) out to the root sentinel.
 */
export function frameChain(forest: CallForest, cursor: CallNodeId): Frame[] {
  const frames: Frame[] = [];
  let id: CallNodeId | null = lastChild(forest, cursor) ?? cursor;
  while (id !== null) {
    const node = getNode(forest, id);
    frames.push({ node: node.id, parent: node.parent, site: node.site });
    id = node.parent;
  }
  return frames;
}

/**
 * Pick the parent for a call when the trace has no nesting field.
 *
 * The closest frame by line number in the same file is taken to be a sibling
 * of the new call, so its parent wins. With no frame in the same file the
 * call nests under the innermost frame. Ties go to the innermost candidate.
 */
export function resolveAttachment(frames: readonly Frame[], site: CallSite): CallNodeId {
  let best: { distance: number; attachTo: CallNodeId } | undefined;
  for (const frame of frames) {
    if (frame.site && frame.site.file === site.file && frame.parent !== null) {
      const distance = Math.abs(frame.site.line - site.line);
      if (!best || distance < best.distance) {
        best = { distance, attachTo: frame.parent };
      }
    } else if (!best) {
      best = { distance: Number.POSITIVE_INFINITY, attachTo: frame.node };
    }
  }
  if (!best) {
    throw new TraceStructureError('Cannot resolve call nesting without any active frame');
  }
  return best.attachTo;
}
