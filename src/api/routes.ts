import type { FastifyInstance, FastifyReply } from 'fastify';
import { getAddress, isAddress, isHexString } from 'ethers';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import type { GovernanceNetwork } from '../services/governanceNetwork.js';
import type { RuntimeMetrics } from '../types.js';
import { toJsonSafe } from '../utils/json.js';

interface RouteDeps {
  config: AppConfig;
  network: GovernanceNetwork;
  getRuntimeMetrics: () => RuntimeMetrics;
}

const addressSchema = z.string()
  .refine((value) => isAddress(value), { message: 'must be a 20-byte hex address' })
  .transform((value) => getAddress(value));

const amountSchema = z.string().regex(/^\d+$/, 'must be an integer amount in wei').transform((value) => BigInt(value));

const bytesSchema = z.string().refine((value) => isHexString(value), { message: 'must be 0x-prefixed hex' });

const chainParamsSchema = z.object({
  chainId: z.coerce.number().int().positive(),
});

const accountParamsSchema = chainParamsSchema.extend({
  account: addressSchema,
});

const proposalParamsSchema = chainParamsSchema.extend({
  proposalId: z.string().regex(/^\d+$/, 'must be a decimal proposal id'),
});

const votesQuerySchema = z.object({
  timepoint: z.coerce.number().int().nonnegative().optional(),
});

const transferSchema = z.object({
  from: addressSchema,
  to: addressSchema,
  amount: amountSchema,
});

const delegateSchema = z.object({
  from: addressSchema,
  to: addressSchema,
});

const stakeSchema = z.object({
  account: addressSchema,
  amount: amountSchema,
});

const claimSchema = z.object({
  account: addressSchema,
});

const proposeSchema = z.object({
  proposer: addressSchema,
  targets: z.array(addressSchema).min(1).max(64),
  values: z.array(amountSchema).min(1).max(64),
  calldatas: z.array(bytesSchema).min(1).max(64),
  description: z.string().min(1).max(10_000),
});

const voteSchema = z.object({
  voter: addressSchema,
  support: z.enum(['against', 'for', 'abstain']),
  reason: z.string().max(2_000).optional(),
});

const cancelSchema = z.object({
  caller: addressSchema,
});

const packetsQuerySchema = z.object({
  status: z.enum(['pending', 'delivered', 'failed']).optional(),
});

const deliverSchema = z.object({
  guid: z.string().regex(/^0x[0-9a-fA-F]{64}$/, 'must be a bytes32 guid'),
});

const advanceClockSchema = z.object({
  seconds: z.number().int().positive().max(10 * 365 * 86_400),
});

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, toJsonSafe(error.details)));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const sendInvalid = (reply: FastifyReply, message: string, error: z.ZodError): FastifyReply => reply
  .code(400)
  .send(toErrorEnvelope(ErrorCode.InvalidPayload, message, error.flatten()));

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { network } = deps;

  /** Run a chain mutation, persist the network, and reply with the serialised result. */
  const mutate = async <T>(
    reply: FastifyReply,
    work: () => T,
    statusCode = 200,
  ): Promise<FastifyReply | undefined> => {
    try {
      const result = work();
      await network.flush();
      return reply.code(statusCode).send(toJsonSafe(result));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  };

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '0.1.0',
    status: 'ok',
    hubChainId: network.hub().eid,
    clockMode: deps.config.clock.mode,
  }));

  app.get('/health', async () => {
    const runtime = deps.getRuntimeMetrics();
    return {
      status: 'ok',
      env: deps.config.app.env,
      uptimeSeconds: runtime.uptimeSeconds,
      pendingPackets: runtime.pendingPackets,
      processPid: runtime.processPid,
      wsClients: runtime.wsClients,
      chains: network.list().length,
    };
  });

  app.get('/chains', async () => ({
    chains: network.list().map((chain) => toJsonSafe(chain.summary())),
  }));

  app.get('/chains/:chainId', async (request, reply) => {
    const params = chainParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      return toJsonSafe(network.chain(params.data.chainId).summary());
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/chains/:chainId/accounts/:account', async (request, reply) => {
    const params = accountParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      return toJsonSafe(network.chain(params.data.chainId).account(params.data.account));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/chains/:chainId/votes/:account', async (request, reply) => {
    const params = accountParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const query = votesQuerySchema.safeParse(request.query);
    if (!query.success) return sendInvalid(reply, 'Invalid query params.', query.error);

    try {
      const chain = network.chain(params.data.chainId);
      const votes = chain.getVotes(params.data.account, query.data.timepoint);
      return toJsonSafe({
        chainId: chain.eid,
        account: params.data.account,
        timepoint: query.data.timepoint ?? null,
        votes,
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/token/transfer', async (request, reply) => {
    const params = chainParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const body = transferSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid transfer payload.', body.error);

    try {
      const chain = network.chain(params.data.chainId);
      const { from, to, amount } = body.data;
      return await mutate(reply, () => {
        chain.transfer(from, to, amount);
        return { from: chain.account(from), to: chain.account(to) };
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/token/burn', async (request, reply) => {
    const params = chainParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const body = stakeSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid burn payload.', body.error);

    try {
      const chain = network.chain(params.data.chainId);
      return await mutate(reply, () => {
        chain.burn(body.data.account, body.data.amount);
        return chain.account(body.data.account);
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/delegate', async (request, reply) => {
    const params = chainParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const body = delegateSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid delegation payload.', body.error);

    try {
      const chain = network.chain(params.data.chainId);
      const { from, to } = body.data;
      return await mutate(reply, () => {
        chain.delegate(from, to);
        return chain.account(from);
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/stake', async (request, reply) => {
    const params = chainParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const body = stakeSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid stake payload.', body.error);

    try {
      const chain = network.chain(params.data.chainId);
      return await mutate(reply, () => {
        chain.stake(body.data.account, body.data.amount);
        return chain.account(body.data.account);
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/unstake', async (request, reply) => {
    const params = chainParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const body = stakeSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid unstake payload.', body.error);

    try {
      const chain = network.chain(params.data.chainId);
      return await mutate(reply, () => {
        chain.unstake(body.data.account, body.data.amount);
        return chain.account(body.data.account);
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/rewards/claim', async (request, reply) => {
    const params = chainParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const body = claimSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid claim payload.', body.error);

    try {
      const chain = network.chain(params.data.chainId);
      return await mutate(reply, () => ({ claimed: chain.getReward(body.data.account) }));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/chains/:chainId/proposals', async (request, reply) => {
    const params = chainParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      return toJsonSafe({ proposals: network.chain(params.data.chainId).proposals() });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/proposals', async (request, reply) => {
    const params = chainParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const body = proposeSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid proposal payload.', body.error);

    try {
      const chain = network.chain(params.data.chainId);
      const { proposer, ...input } = body.data;
      return await mutate(reply, () => chain.proposal(chain.propose(proposer, input)), 201);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/chains/:chainId/proposals/:proposalId', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      return toJsonSafe(network.chain(params.data.chainId).proposal(params.data.proposalId));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/proposals/:proposalId/votes', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const body = voteSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid vote payload.', body.error);

    try {
      const chain = network.chain(params.data.chainId);
      const { proposalId } = params.data;
      const { voter, support, reason } = body.data;
      return await mutate(reply, () => ({
        proposalId,
        voter,
        support,
        weight: chain.castVote(voter, proposalId, support, reason),
      }));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/proposals/:proposalId/queue', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      const chain = network.chain(params.data.chainId);
      return await mutate(reply, () => {
        chain.queue(params.data.proposalId);
        return chain.proposal(params.data.proposalId);
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/proposals/:proposalId/execute', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      const chain = network.chain(params.data.chainId);
      return await mutate(reply, () => {
        chain.execute(params.data.proposalId);
        return chain.proposal(params.data.proposalId);
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/chains/:chainId/proposals/:proposalId/cancel', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);
    const body = cancelSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid cancel payload.', body.error);

    try {
      const chain = network.chain(params.data.chainId);
      return await mutate(reply, () => {
        chain.cancel(body.data.caller, params.data.proposalId);
        return chain.proposal(params.data.proposalId);
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/relay/packets', async (request, reply) => {
    const query = packetsQuerySchema.safeParse(request.query);
    if (!query.success) return sendInvalid(reply, 'Invalid query params.', query.error);
    return toJsonSafe({ packets: network.packets(query.data.status) });
  });

  app.post('/relay/deliver', async (request, reply) => {
    const body = deliverSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid delivery payload.', body.error);

    try {
      const result = network.deliver(body.data.guid);
      await network.flush();
      return toJsonSafe(result);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/clock/advance', async (request, reply) => {
    const body = advanceClockSchema.safeParse(request.body);
    if (!body.success) return sendInvalid(reply, 'Invalid clock payload.', body.error);

    try {
      return { now: network.advanceClock(body.data.seconds) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });
}
