import { ethers } from 'ethers';
import { z } from 'zod';
import type { PublishReceipt, TrustSnapshot } from '../types/domain.js';
import { errorMessage } from '../utils/errors.js';
import { signSnapshotAttestation, snapshotHash } from './attestation.js';
import { createLogger, type Logger } from './logger.js';
import type { ValidatorStore } from './store.js';
import { quantizeU16, shapeWeights, type WeightPolicy } from './weights.js';

/** Identity, membership and publication collaborator of the round scheduler. */
export interface LedgerClient {
  currentParticipantIds(): Promise<ReadonlySet<string>>;
  publish(snapshot: TrustSnapshot): Promise<PublishReceipt>;
}

type SnapshotArchive = Pick<ValidatorStore, 'savePublishedSnapshot'>;

/** Ledger backed by the validator's own registry; publication is an archived snapshot. */
export class LocalLedgerClient implements LedgerClient {
  constructor(
    private readonly store: Pick<ValidatorStore, 'listParticipants' | 'savePublishedSnapshot'>,
    private readonly weightPolicy: Partial<WeightPolicy> = {}
  ) {}

  async currentParticipantIds(): Promise<ReadonlySet<string>> {
    return new Set(this.store.listParticipants({ enabledOnly: true }).map((participant) => participant.id));
  }

  async publish(snapshot: TrustSnapshot): Promise<PublishReceipt> {
    try {
      const hash = snapshotHash(snapshot);
      const weights = shapeWeights(snapshot, this.weightPolicy);
      this.store.savePublishedSnapshot({
        round: snapshot.round,
        snapshotHash: hash,
        snapshot,
        weights,
        publishedAt: new Date().toISOString()
      });
      return { ok: true, reference: `local:${snapshot.round}:${hash.slice(0, 16)}` };
    } catch (error) {
      return { ok: false, reason: errorMessage(error, 'local_publish_failed') };
    }
  }
}

export const WEIGHTS_CONTRACT_ABI = [
  'function participants() view returns (string[])',
  'function setWeights(bytes32 snapshotHash, uint64 round, string[] participantIds, uint16[] weights, bytes signature)'
] as const;

/** The two contract calls the chain ledger needs, so tests can stand in for the chain. */
export interface WeightsContract {
  participants(): Promise<unknown>;
  setWeights(
    snapshotHash: string,
    round: number,
    participantIds: string[],
    weights: number[],
    signature: string
  ): Promise<{ hash: string; wait(): Promise<unknown> }>;
}

export function weightsContract(address: string, runner: ethers.ContractRunner): WeightsContract {
  const contract = new ethers.Contract(address, WEIGHTS_CONTRACT_ABI, runner);
  return {
    participants: () => contract.getFunction('participants').staticCall(),
    setWeights: (hash, round, participantIds, weights, signature) =>
      contract.getFunction('setWeights').send(hash, round, participantIds, weights, signature)
  };
}

const participantIdsSchema = z.array(z.string().min(1));

export type ChainLedgerOptions = {
  contract: WeightsContract;
  signer: ethers.BaseWallet;
  weightPolicy?: Partial<WeightPolicy>;
  archive?: SnapshotArchive;
  logger?: Logger;
};

export class ChainLedgerClient implements LedgerClient {
  private readonly log: Logger;

  constructor(private readonly options: ChainLedgerOptions) {
    this.log = (options.logger ?? createLogger()).child({ component: 'chain-ledger' });
  }

  static connect(params: {
    rpcUrl: string;
    contractAddress: string;
    privateKey: string;
    weightPolicy?: Partial<WeightPolicy>;
    archive?: SnapshotArchive;
    logger?: Logger;
  }): ChainLedgerClient {
    const provider = new ethers.JsonRpcProvider(params.rpcUrl);
    const signer = new ethers.Wallet(params.privateKey, provider);
    return new ChainLedgerClient({
      contract: weightsContract(params.contractAddress, signer),
      signer,
      weightPolicy: params.weightPolicy,
      archive: params.archive,
      logger: params.logger
    });
  }

  async currentParticipantIds(): Promise<ReadonlySet<string>> {
    const ids = participantIdsSchema.parse(await this.options.contract.participants());
    return new Set(ids);
  }

  private async sendWeights(snapshot: TrustSnapshot) {
    const weights = shapeWeights(snapshot, this.options.weightPolicy);
    const attestation = await signSnapshotAttestation(this.options.signer, snapshot, weights);
    const tx = await this.options.contract.setWeights(
      `0x${attestation.payload.snapshotHash}`,
      snapshot.round,
      weights.participantIds,
      quantizeU16(weights.weights),
      attestation.signature
    );
    await tx.wait();
    return { weights, hash: attestation.payload.snapshotHash, reference: tx.hash };
  }

  async publish(snapshot: TrustSnapshot): Promise<PublishReceipt> {
    const sent = await this.sendWeights(snapshot).then(
      (value) => ({ ok: true as const, ...value }),
      (error: unknown) => ({ ok: false as const, reason: errorMessage(error, 'chain_publish_failed') })
    );
    if (!sent.ok) return { ok: false, reason: sent.reason };

    // the weights are on chain now; an archive failure is logged and the receipt stays ok
    try {
      this.options.archive?.savePublishedSnapshot({
        round: snapshot.round,
        snapshotHash: sent.hash,
        snapshot,
        weights: sent.weights,
        publishedAt: new Date().toISOString()
      });
    } catch (error) {
      this.log.error({ err: error, round: snapshot.round, reference: sent.reference }, 'failed to archive published snapshot');
    }

    return { ok: true, reference: sent.reference };
  }
}

