import type { FastifyPluginAsync } from 'fastify';
import isRoot from 'is-root';
import os from 'node:os';
import { ProcessTreeError } from '../../src/errors.js';
import type { Snapshot } from '../../src/snapshot.js';
import { summarize } from '../../src/snapshot.js';

export interface TreeRouteOptions {
  /** Takes one fresh snapshot per call */
  snapshot: () => Promise<Snapshot>;
}

export const treeRoutes: FastifyPluginAsync<TreeRouteOptions> = async (fastify, opts) => {
  // Fresh snapshot of the process tree
  fastify.get('/tree', async (request, reply) => {
    try {
      const snapshot = await opts.snapshot();
      const nodes = [...snapshot.tree.nodes.values()].sort((a, b) => a.pid - b.pid);
      return {
        roots: snapshot.tree.roots,
        nodes,
        events: snapshot.events,
        summary: summarize(snapshot),
      };
    } catch (err) {
      if (!(err instanceof ProcessTreeError)) throw err;
      request.log.error({ err }, 'Process tree snapshot failed');
      return reply.code(500).send({ error: err.message, kind: err.kind });
    }
  });

  // Host summary
  fastify.get('/stats', async () => {
    return {
      platform: os.platform(),
      arch: os.arch(),
      hostname: os.hostname(),
      uptime: os.uptime(),
      isRoot: isRoot(),
    };
  });
};
