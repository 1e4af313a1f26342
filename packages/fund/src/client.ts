/**
 * Fund Client
 *
 * Typed wrappers for every view and endpoint of the fund contract. Requests go
 * through an integrator-provided ContractBackend; return slots are decoded here.
 */

import {
  addressArg,
  bigUintArg,
  boolArg,
  strArg,
  u64Arg,
  type CallReceipt,
  type ContractArgument,
  type ContractBackend,
} from "./backend";
import { createAddressRenderer, isValidFundAddress, type AddressFormat } from "./codec/address";
import { FundDecoder } from "./codec/return-data";
import {
  DEFAULT_CHAIN_ID,
  DEFAULT_GAS_LIMIT_CALL,
  DEFAULT_GAS_PRICE,
  DEFAULT_PAGE_SIZE,
  FUND_ENDPOINTS,
  FUND_VIEWS,
  type FundEndpoint,
  type FundView,
} from "./constants";
import { FundClientError } from "./errors";
import type { ContractConfig, FundStats, Proposal, VoteRecord } from "./types";

/**
 * Configuration for a FundClient
 *
 * A resolved FundConfig can be passed as is.
 */
export interface FundClientConfig {
  /**
   * Bech32 address of the deployed fund contract
   */
  contractAddress: string;

  /**
   * Chain identifier sent with calls (default: "C")
   */
  chainId?: string;

  /**
   * Gas limit of state-changing calls
   */
  gasLimit?: bigint;

  gasPrice?: bigint;

  /**
   * Rendering of decoded addresses (default: bech32)
   */
  addressFormat?: AddressFormat;

  /**
   * Log each request to the console
   */
  verbose?: boolean;
}

/**
 * Client for the autonomous fund contract.
 *
 * @example
 * ```typescript
 * const client = new FundClient(backend, loadFundConfig());
 * const active = await client.getActiveProposals();
 * ```
 */
export class FundClient {
  readonly decoder: FundDecoder;

  /**
   * Creates a new FundClient instance.
   *
   * @param backend - Transport that runs queries and submits calls
   * @param config - Contract address, gas settings and address format
   */
  constructor(
    private readonly backend: ContractBackend,
    private readonly config: FundClientConfig,
  ) {
    if (!isValidFundAddress(config.contractAddress)) {
      throw new FundClientError(
        `Invalid fund contract address: ${config.contractAddress}`,
        "INVALID_CONFIG",
      );
    }
    this.decoder = new FundDecoder(createAddressRenderer(config.addressFormat ?? "bech32"));
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  /**
   * Gets the fund totals
   *
   * @returns Promise resolving to the stats, or null if the view returned fewer than 5 values
   */
  async getStats(): Promise<FundStats | null> {
    const result = await this.query(FUND_VIEWS.FUND_STATS);
    if (result.length < 5) {
      return null;
    }
    return {
      aum: this.decoder.bigUint(result[0]),
      totalShares: this.decoder.bigUint(result[1]),
      memberCount: this.decoder.u64(result[2]),
      proposalCount: this.decoder.u64(result[3]),
      minUptimeScore: this.decoder.u64(result[4]),
    };
  }

  /**
   * Gets the price of one share in attoCLAW
   *
   * @returns Promise resolving to the price, or null if the view returned nothing
   */
  async getSharePrice(): Promise<bigint | null> {
    const result = await this.query(FUND_VIEWS.SHARE_PRICE);
    return result.length === 0 ? null : this.decoder.bigUint(result[0]);
  }

  /**
   * Gets a single proposal
   *
   * @param proposalId - The proposal ID
   * @returns Promise resolving to the proposal, or null if the view returned nothing
   */
  async getProposal(proposalId: bigint | number): Promise<Proposal | null> {
    const result = await this.query(FUND_VIEWS.PROPOSAL, [u64Arg(proposalId)]);
    return result.length === 0 ? null : this.decoder.proposal(result[0]);
  }

  /**
   * Gets a page of proposals
   *
   * @param fromId - First proposal ID (default: 1)
   * @param count - Page size (default: 50)
   * @returns Promise resolving to the proposals
   */
  async getProposals(fromId: bigint | number = 1, count: bigint | number = DEFAULT_PAGE_SIZE): Promise<Proposal[]> {
    const result = await this.query(FUND_VIEWS.PROPOSALS, [u64Arg(fromId), u64Arg(count)]);
    return this.decoder.proposals(result);
  }

  /**
   * Gets all Open, Passed and Executable proposals
   *
   * @returns Promise resolving to the proposals
   */
  async getActiveProposals(): Promise<Proposal[]> {
    const result = await this.query(FUND_VIEWS.ACTIVE_PROPOSALS);
    return this.decoder.proposals(result);
  }

  /**
   * Gets a page of member addresses
   *
   * @param fromIndex - First member index (default: 0)
   * @param count - Page size (default: 50)
   * @returns Promise resolving to the addresses
   */
  async getMembers(fromIndex: bigint | number = 0, count: bigint | number = DEFAULT_PAGE_SIZE): Promise<string[]> {
    const result = await this.query(FUND_VIEWS.MEMBERS, [u64Arg(fromIndex), u64Arg(count)]);
    return this.decoder.addresses(result);
  }

  /**
   * Gets an agent's share balance
   *
   * @param agentAddress - The agent's address
   * @returns Promise resolving to the shares (0 if the view returned nothing)
   */
  async getMemberShares(agentAddress: string): Promise<bigint> {
    const agent = this.addressArgument(FUND_VIEWS.MEMBER_SHARES, agentAddress);
    const result = await this.query(FUND_VIEWS.MEMBER_SHARES, [agent]);
    return result.length === 0 ? BigInt(0) : this.decoder.bigUint(result[0]);
  }

  /**
   * Gets the total spent by executed proposals in an epoch
   *
   * @param epoch - The epoch number
   * @returns Promise resolving to the amount in attoCLAW (0 if the view returned nothing)
   */
  async getEpochSpent(epoch: bigint | number): Promise<bigint> {
    const result = await this.query(FUND_VIEWS.EPOCH_SPENT, [u64Arg(epoch)]);
    return result.length === 0 ? BigInt(0) : this.decoder.bigUint(result[0]);
  }

  /**
   * Gets every vote cast on a proposal
   *
   * @param proposalId - The proposal ID
   * @returns Promise resolving to the vote records
   */
  async getVoteRecords(proposalId: bigint | number): Promise<VoteRecord[]> {
    const result = await this.query(FUND_VIEWS.VOTE_RECORDS, [u64Arg(proposalId)]);
    return this.decoder.voteRecords(result);
  }

  /**
   * Checks whether an agent has voted on a proposal
   *
   * @param proposalId - The proposal ID
   * @param agentAddress - The agent's address
   * @returns Promise resolving to true if a vote is recorded
   */
  async hasAgentVoted(proposalId: bigint | number, agentAddress: string): Promise<boolean> {
    const agent = this.addressArgument(FUND_VIEWS.HAS_AGENT_VOTED, agentAddress);
    const result = await this.query(FUND_VIEWS.HAS_AGENT_VOTED, [u64Arg(proposalId), agent]);
    return result.length === 0 ? false : this.decoder.bool(result[0]);
  }

  /**
   * Gets the contract's governance parameters
   *
   * @returns Promise resolving to the config, or null if the view returned fewer than 4 values
   */
  async getConfig(): Promise<ContractConfig | null> {
    const result = await this.query(FUND_VIEWS.CONTRACT_CONFIG);
    if (result.length < 4) {
      return null;
    }
    return {
      minDeposit: this.decoder.bigUint(result[0]),
      minUptimeScore: this.decoder.u64(result[1]),
      votingPeriod: this.decoder.u64(result[2]),
      timelockPeriod: this.decoder.u64(result[3]),
    };
  }

  // ==========================================================================
  // Endpoints
  // ==========================================================================

  /**
   * Deposits CLAW into the fund in exchange for shares
   *
   * @param amount - Amount in attoCLAW
   * @returns Promise resolving to the submission receipt
   */
  async deposit(amount: bigint): Promise<CallReceipt> {
    return this.call(FUND_ENDPOINTS.DEPOSIT, [], amount);
  }

  /**
   * Burns shares and withdraws the matching CLAW
   *
   * @param shareAmount - Number of shares to burn
   * @returns Promise resolving to the submission receipt
   */
  async withdraw(shareAmount: bigint): Promise<CallReceipt> {
    return this.call(FUND_ENDPOINTS.WITHDRAW, [bigUintArg(shareAmount)]);
  }

  /**
   * Submits a spending proposal linked to a bulletin board post
   *
   * @param description - Proposal text
   * @param receiver - Address to pay when executed
   * @param amount - Amount in attoCLAW
   * @param bulletinPostId - Discussion post ID
   * @returns Promise resolving to the submission receipt
   */
  async submitProposal(
    description: string,
    receiver: string,
    amount: bigint,
    bulletinPostId: bigint | number,
  ): Promise<CallReceipt> {
    const endpoint = FUND_ENDPOINTS.SUBMIT_PROPOSAL;
    return this.call(endpoint, [
      strArg(description),
      this.addressArgument(endpoint, receiver),
      bigUintArg(amount),
      u64Arg(bulletinPostId),
    ]);
  }

  /**
   * Votes on an open proposal
   *
   * @param proposalId - The proposal ID
   * @param support - True for yes, false for no
   * @returns Promise resolving to the submission receipt
   */
  async vote(proposalId: bigint | number, support: boolean): Promise<CallReceipt> {
    return this.call(FUND_ENDPOINTS.VOTE, [u64Arg(proposalId), boolArg(support)]);
  }

  /**
   * Closes voting once the window has elapsed (Open → Passed or Failed)
   *
   * @param proposalId - The proposal ID
   * @returns Promise resolving to the submission receipt
   */
  async finalizeVoting(proposalId: bigint | number): Promise<CallReceipt> {
    return this.call(FUND_ENDPOINTS.FINALIZE_VOTING, [u64Arg(proposalId)]);
  }

  /**
   * Executes a passed proposal after its time-lock
   *
   * @param proposalId - The proposal ID
   * @returns Promise resolving to the submission receipt
   */
  async executeProposal(proposalId: bigint | number): Promise<CallReceipt> {
    return this.call(FUND_ENDPOINTS.EXECUTE_PROPOSAL, [u64Arg(proposalId)]);
  }

  /**
   * Cancels one of the caller's open proposals
   *
   * @param proposalId - The proposal ID
   * @returns Promise resolving to the submission receipt
   */
  async cancelProposal(proposalId: bigint | number): Promise<CallReceipt> {
    return this.call(FUND_ENDPOINTS.CANCEL_PROPOSAL, [u64Arg(proposalId)]);
  }

  /**
   * Marks an open proposal whose window expired as Failed
   *
   * @param proposalId - The proposal ID
   * @returns Promise resolving to the submission receipt
   */
  async expireProposal(proposalId: bigint | number): Promise<CallReceipt> {
    return this.call(FUND_ENDPOINTS.EXPIRE_PROPOSAL, [u64Arg(proposalId)]);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private addressArgument(endpoint: FundView | FundEndpoint, address: string): ContractArgument {
    if (!isValidFundAddress(address)) {
      throw new FundClientError(`Invalid address argument: ${address}`, "INVALID_ARGUMENT", {
        endpoint,
      });
    }
    return addressArg(address);
  }

  private async query(view: FundView, args: ContractArgument[] = []): Promise<string[]> {
    if (this.config.verbose) {
      console.log("[fund client] Query:", { view, args: args.length });
    }
    try {
      return await this.backend.query(this.config.contractAddress, view, args);
    } catch (error) {
      throw new FundClientError(`Query ${view} failed`, "BACKEND_FAILED", {
        endpoint: view,
        cause: error,
      });
    }
  }

  private async call(
    endpoint: FundEndpoint,
    args: ContractArgument[],
    value: bigint = BigInt(0),
  ): Promise<CallReceipt> {
    let receipt: CallReceipt;
    try {
      receipt = await this.backend.call(this.config.contractAddress, endpoint, args, {
        value,
        gasLimit: this.config.gasLimit ?? DEFAULT_GAS_LIMIT_CALL,
        gasPrice: this.config.gasPrice ?? DEFAULT_GAS_PRICE,
        chainId: this.config.chainId ?? DEFAULT_CHAIN_ID,
      });
    } catch (error) {
      throw new FundClientError(`Call ${endpoint} failed`, "BACKEND_FAILED", {
        endpoint,
        cause: error,
      });
    }

    if (this.config.verbose) {
      console.log("[fund client] Submitted call:", { endpoint, txHash: receipt.txHash });
    }
    return receipt;
  }
}
