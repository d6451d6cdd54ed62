import fs from 'node:fs/promises';
import { getAddress, isAddress, parseEther } from 'ethers';
import { z } from 'zod';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';

const addressSchema = z.string()
  .refine((value) => isAddress(value), { message: 'must be a 20-byte hex address' })
  .transform((value) => getAddress(value));

/** Decimal token amount, converted to WAD. */
const amountSchema = z.string()
  .regex(/^\d+(\.\d{1,18})?$/, 'must be a decimal amount')
  .transform((value) => parseEther(value));

const chainSchema = z.object({
  eid: z.number().int().positive(),
  name: z.string().min(1).max(64),
  hub: z.boolean().default(false),
  nativeTreasury: amountSchema.default('0'),
  guardians: z.array(z.object({
    account: addressSchema,
    expiresAt: z.number().int().nonnegative(),
  })).default([]),
  allocations: z.array(z.object({
    account: addressSchema,
    amount: amountSchema,
  })).default([]),
});

export const networkConfigSchema = z.object({
  chains: z.array(chainSchema).min(1),
}).superRefine((network, ctx) => {
  const hubs = network.chains.filter((chain) => chain.hub);
  if (hubs.length !== 1) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'exactly one chain must be the hub', path: ['chains'] });
  }
  const eids = new Set(network.chains.map((chain) => chain.eid));
  if (eids.size !== network.chains.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'endpoint ids must be unique', path: ['chains'] });
  }
});

export type NetworkConfig = z.infer<typeof networkConfigSchema>;
export type NetworkConfigInput = z.input<typeof networkConfigSchema>;
export type ChainConfig = NetworkConfig['chains'][number];

export const parseNetworkConfig = (raw: unknown): NetworkConfig => {
  const parse = networkConfigSchema.safeParse(raw);
  if (!parse.success) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, 'Invalid network configuration.', parse.error.flatten());
  }
  return parse.data;
};

export async function loadNetworkConfig(filePath: string): Promise<NetworkConfig> {
  const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  return parseNetworkConfig(raw);
}
