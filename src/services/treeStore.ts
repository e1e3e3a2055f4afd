import { promises as fs } from 'fs';
import { z } from 'zod';
import { callCount, createForest } from '../shared/callTree/forest';
import { ROOT_ID } from '../shared/callTree/types';
import type { CallForest, CallNode } from '../shared/callTree/types';
import { TreeStoreError } from '../utils/error';
import { logTrace, logWarn } from '../utils/logger';

const STORE_VERSION = 1;

const callSiteSchema = z.object({
  file: z.string(),
  line: z.number().int(),
  code: z.string()
});

const storedNodeSchema = z.object({
  site: callSiteSchema.nullable(),
  duration: z.number().nonnegative(),
  parent: z.number().int().nonnegative().nullable(),
  children: z.array(z.number().int().nonnegative())
});

const storedForestSchema = z.object({
  version: z.literal(STORE_VERSION),
  nodes: z.array(storedNodeSchema).min(1),
  roots: z.array(z.number().int().nonnegative())
});

type StoredForest = z.infer<typeof storedForestSchema>;

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

function toStored(forest: CallForest): StoredForest {
  return {
    version: STORE_VERSION,
    nodes: forest.nodes.map(n => ({
      site: n.site ? { file: n.site.file, line: n.site.line, code: n.site.code } : null,
      duration: n.duration,
      parent: n.parent,
      children: [...n.children]
    })),
    roots: [...forest.roots]
  };
}

function fromStored(file: string, stored: StoredForest): CallForest {
  const fail = (why: string) => new TreeStoreError(`Inconsistent call tree in ${file}: ${why}`);
  const nodes: CallNode[] = stored.nodes.map((n, id) => {
    const node: CallNode = { id, duration: n.duration, parent: n.parent, children: [...n.children] };
    if (n.site) node.site = n.site;
    return node;
  });

  nodes.forEach((node, id) => {
    if (id === ROOT_ID) {
      if (node.parent !== null || node.site) throw fail('first node is not the root');
    } else if (node.parent === null || !node.site || !nodes[node.parent]?.children.includes(id)) {
      throw fail(`node #${id} is detached`);
    }
    for (const child of node.children) {
      if (nodes[child]?.parent !== id) throw fail(`node #${child} is not a child of #${id}`);
    }
  });
  const rootChildren = nodes[ROOT_ID]?.children ?? [];
  if (rootChildren.length !== stored.roots.length || rootChildren.some((id, i) => stored.roots[i] !== id)) {
    throw fail('top-level calls do not match the root');
  }
  // every node reachable from the root exactly once, so no cycles
  const reached: number[] = [ROOT_ID];
  for (let i = 0; i < reached.length && reached.length <= nodes.length; i++) {
    reached.push(...(nodes[reached[i] ?? ROOT_ID]?.children ?? []));
  }
  if (reached.length !== nodes.length) throw fail('some calls are not reachable from the root');
  return { nodes, roots: [...stored.roots] };
}

/**
 * Write the forest next to its destination first so an interrupted run never
 * leaves a truncated store behind.
 */
export async function saveForest(file: string, forest: CallForest): Promise<void> {
  const tmp = `${file}.tmp`;
  try {
    await fs.writeFile(tmp, JSON.stringify(toStored(forest)), 'utf8');
    await fs.rename(tmp, file);
  } catch (e) {
    await fs.rm(tmp, { force: true }).catch((err: unknown) => logWarn('Failed to remove', tmp, '->', err));
    throw e;
  }
  logTrace('Saved', callCount(forest), 'calls to', file);
}

export async function loadForest(file: string): Promise<CallForest> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (e) {
    if (isNotFound(e)) {
      logTrace('No saved call tree at', file);
      return createForest();
    }
    throw e;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new TreeStoreError(`Saved call tree ${file} is not valid JSON`, { cause: e });
  }
  const parsed = storedForestSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new TreeStoreError(`Saved call tree ${file} has an unexpected shape: ${detail}`);
  }
  return fromStored(file, parsed.data);
}

export async function removeStore(file: string): Promise<void> {
  await fs.rm(file, { force: true });
}
