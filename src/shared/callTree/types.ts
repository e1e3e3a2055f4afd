import type { CallSite } from '../traceParser/types';

export type CallNodeId = number; // index into CallForest.nodes

export type CallNode = {
  id: CallNodeId;
  site?: CallSite; // undefined only for the root sentinel
  duration: number; // seconds, including all descendants
  parent: CallNodeId | null; // null only for the root sentinel
  children: CallNodeId[];
};

export type CallForest = {
  // nodes[ROOT_ID] is the sentinel standing for "outside any call"
  nodes: CallNode[];
  // top-level calls in first-seen order
  roots: CallNodeId[];
};

// One entry of the active call chain, innermost first
export type Frame = {
  node: CallNodeId;
  parent: CallNodeId | null;
  site?: CallSite;
};

export const ROOT_ID: CallNodeId = 0;
