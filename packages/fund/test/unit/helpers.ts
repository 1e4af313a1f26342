import { vi, type Mock } from "vitest";
import type { CallReceipt, ContractArgument, ContractBackend } from "../../src";

// Bech32 renderings of 32 repeated bytes, e.g. ADDRESSES[0x11] is 0x1111…11
export const ADDRESSES: Record<number, string> = {
  0x00: "claw1qqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqq3f4jsc",
  0x05: "claw1q5zs2pg9q5zs2pg9q5zs2pg9q5zs2pg9q5zs2pg9q5zs2pg9q5zsgp93h4",
  0x11: "claw1zyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3zygs2uel6k",
  0x22: "claw1yg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3zyg3qeg82r6",
  0x33: "claw1xvenxvenxvenxvenxvenxvenxvenxvenxvenxvenxvenxvenxveszat8f5",
  0xff: "claw1lllllllllllllllllllllllllllllllllllllllllllllllllllsnhkre0",
};

export const CONTRACT_ADDRESS = ADDRESSES[0x05];

export function pubkey(fill: number): Uint8Array {
  return new Uint8Array(32).fill(fill);
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((acc, part) => acc + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

// Minimal big-endian bytes; empty for zero
export function bigEndian(value: bigint): Uint8Array {
  const bytes: number[] = [];
  let rest = value;
  while (rest > 0n) {
    bytes.unshift(Number(rest & 0xffn));
    rest >>= 8n;
  }
  return new Uint8Array(bytes);
}

export function u64(value: bigint): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, value);
  return out;
}

export function u8(value: number): Uint8Array {
  return new Uint8Array([value]);
}

export function lengthPrefixed(payload: Uint8Array): Uint8Array {
  const prefix = new Uint8Array(4);
  new DataView(prefix.buffer).setUint32(0, payload.length);
  return concat(prefix, payload);
}

export function bigUint(value: bigint): Uint8Array {
  return lengthPrefixed(bigEndian(value));
}

export function text(value: string): Uint8Array {
  return lengthPrefixed(new TextEncoder().encode(value));
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

export interface ProposalFields {
  id: bigint;
  proposer: number;
  description: string;
  receiver: number;
  amount: bigint;
  status: number;
  yesVotes: bigint;
  noVotes: bigint;
  createdAt: bigint;
  passedAt: bigint;
  bulletinPostId: bigint;
}

export const EMPTY_PROPOSAL: ProposalFields = {
  id: 0n,
  proposer: 0x00,
  description: "",
  receiver: 0x11,
  amount: 0n,
  status: 0,
  yesVotes: 0n,
  noVotes: 0n,
  createdAt: 0n,
  passedAt: 0n,
  bulletinPostId: 0n,
};

export function encodeProposal(fields: ProposalFields): Uint8Array {
  return concat(
    u64(fields.id),
    pubkey(fields.proposer),
    text(fields.description),
    pubkey(fields.receiver),
    bigUint(fields.amount),
    u8(fields.status),
    bigUint(fields.yesVotes),
    bigUint(fields.noVotes),
    u64(fields.createdAt),
    u64(fields.passedAt),
    u64(fields.bulletinPostId),
  );
}

export function encodeVoteRecord(voter: number, direction: number, weight: bigint): Uint8Array {
  return concat(pubkey(voter), u8(direction), bigUint(weight));
}

export type QueryMock = Mock<ContractBackend["query"]>;
export type CallMock = Mock<ContractBackend["call"]>;

/**
 * In-process backend: queries answer from a table of return slots
 */
export function createFakeBackend(returnData: Record<string, string[]> = {}): {
  backend: ContractBackend;
  query: QueryMock;
  call: CallMock;
} {
  const query = vi.fn<ContractBackend["query"]>(
    async (_contract: string, functionName: string, _args: readonly ContractArgument[]) =>
      returnData[functionName] ?? [],
  );
  const call = vi.fn<ContractBackend["call"]>(
    async (): Promise<CallReceipt> => ({ txHash: "test-tx-hash", status: "pending" }),
  );
  return { backend: { query, call }, query, call };
}
