import { ethers } from "ethers";
import { z } from "zod";
import { computeRequestId } from "./ancillary";
import { DroppedTransactionError, TransientChainError } from "./errors";
import {
  OracleSource,
  RequestView,
  SettlementAuthorizer,
  SignedSettlement,
  TimeSample,
  TimeSource,
  TxConfirmation,
} from "./types";

const ORACLE_ABI = [
  "function pendingRequests() external view returns (bytes32[])",
  "function getRequest(bytes32 requestId) external view returns (tuple(address requester, address rewardToken, uint256 reward, uint256 timestamp, bytes32 identifier, bytes ancillaryData, bool settled, int256 settledPrice, bytes32 evidenceHash))",
  "function settlePrice(bytes32 identifier, uint256 timestamp, bytes ancillaryData, int256 price, bytes32 evidenceHash) external",
  "function requestPrice(bytes32 identifier, uint256 timestamp, bytes ancillaryData, address rewardToken, uint256 reward) external",
  "function isTrustedResolver(address resolver) external view returns (bool)",
  "event PriceSettled(bytes32 indexed requestId, int256 price, bytes32 evidenceHash)",
];

const OnChainRequestSchema = z.object({
  requester: z.string(),
  timestamp: z.bigint(),
  identifier: z.string(),
  ancillaryData: z.string(),
  settled: z.boolean(),
  settledPrice: z.bigint(),
  evidenceHash: z.string(),
});

export type OnChainRequest = z.infer<typeof OnChainRequestSchema>;

function toPlain(value: unknown): unknown {
  if (value instanceof ethers.Result) return value.toObject();
  return value;
}

function toList(value: unknown): unknown {
  if (value instanceof ethers.Result) return value.toArray();
  return value;
}

export interface ChainOracleOptions {
  rpcUrl: string;
  chainId: number;
  privateKey: string;
  oracleAddress: string;
  gasLimit: bigint;
}

/**
 * The oracle contract seen through the engine's collaborator contracts: request
 * source, settlement sink, signer authorization and block time.
 */
export class ChainOracle implements OracleSource, SettlementAuthorizer, TimeSource {
  readonly provider: ethers.JsonRpcProvider;
  readonly wallet: ethers.Wallet;
  private readonly signer: ethers.NonceManager;
  private readonly contract: ethers.Contract;
  private readonly gasLimit: bigint;

  constructor(options: ChainOracleOptions) {
    this.provider = new ethers.JsonRpcProvider(options.rpcUrl, options.chainId, { staticNetwork: true });
    this.wallet = new ethers.Wallet(options.privateKey, this.provider);
    this.signer = new ethers.NonceManager(this.wallet);
    this.contract = new ethers.Contract(options.oracleAddress, ORACLE_ABI, this.signer);
    this.gasLimit = options.gasLimit;
  }

  get address(): string {
    return this.wallet.address;
  }

  async getRequest(requestId: string): Promise<OnChainRequest> {
    const raw: unknown = await this.contract.getFunction("getRequest").staticCall(requestId);
    return OnChainRequestSchema.parse(toPlain(raw));
  }

  async listOutstanding(): Promise<RequestView[]> {
    const raw: unknown = await this.contract.getFunction("pendingRequests").staticCall();
    const ids = z.array(z.string()).parse(toList(raw));
    const views: RequestView[] = [];
    for (const id of ids) {
      const req = await this.getRequest(id);
      const timestamp = Number(req.timestamp);
      const derivedId = computeRequestId(req.identifier, timestamp, req.ancillaryData);
      if (derivedId.toLowerCase() !== id.toLowerCase()) {
        console.warn(`[Chain] Request ${id} does not hash to its parameters (got ${derivedId}), skipping`);
        continue;
      }
      views.push({
        id,
        identifier: req.identifier,
        requester: req.requester,
        timestamp,
        ancillaryData: req.ancillaryData,
        settled: req.settled,
      });
    }
    return views;
  }

  async isSettled(requestId: string): Promise<boolean> {
    const req = await this.getRequest(requestId);
    return req.settled;
  }

  async isAuthorized(): Promise<boolean> {
    const raw: unknown = await this.contract.getFunction("isTrustedResolver").staticCall(this.wallet.address);
    return z.boolean().parse(raw);
  }

  async prepareSettlement(requestId: string, price: bigint, evidenceHash: string): Promise<SignedSettlement> {
    const req = await this.getRequest(requestId);
    const call = await this.contract
      .getFunction("settlePrice")
      .populateTransaction(req.identifier, req.timestamp, req.ancillaryData, price, evidenceHash);
    const nonce = await this.signer.getNonce("pending");
    const tx = await this.wallet.populateTransaction({ ...call, nonce, gasLimit: this.gasLimit });
    const rawTx = await this.wallet.signTransaction(tx);
    this.signer.increment();
    return { txHash: ethers.keccak256(rawTx), rawTx };
  }

  async broadcastSettlement(settlement: SignedSettlement): Promise<void> {
    if (await this.isKnown(settlement.txHash)) return;
    try {
      await this.provider.broadcastTransaction(settlement.rawTx);
    } catch (e) {
      if (ethers.isError(e, "NONCE_EXPIRED") || ethers.isError(e, "REPLACEMENT_UNDERPRICED")) {
        // mined between the lookup and the send
        if (await this.isKnown(settlement.txHash)) return;
        this.signer.reset();
        throw new DroppedTransactionError(settlement.txHash, e.shortMessage);
      }
      throw e;
    }
  }

  private async isKnown(txHash: string): Promise<boolean> {
    return (await this.provider.getTransaction(txHash)) !== null;
  }

  async getConfirmation(txHash: string): Promise<TxConfirmation> {
    const receipt = await this.provider.getTransactionReceipt(txHash);
    if (!receipt) return "pending";
    return receipt.status === 1 ? "confirmed" : "reverted";
  }

  async fetchTime(): Promise<TimeSample> {
    const block = await this.provider.getBlock("latest");
    if (!block) throw new TransientChainError("Latest block unavailable");
    return {
      time: block.timestamp * 1000,
      proof: JSON.stringify({ number: block.number, hash: block.hash }),
    };
  }

  async requestPrice(identifier: string, timestamp: number, ancillaryData: string): Promise<string> {
    const tx = await this.contract
      .getFunction("requestPrice")
      .send(identifier, timestamp, ancillaryData, ethers.ZeroAddress, 0, { gasLimit: this.gasLimit });
    const receipt = await tx.wait();
    if (!receipt || receipt.status !== 1) throw new Error(`requestPrice reverted: tx=${tx.hash}`);
    return tx.hash;
  }
}
