import { ethers } from 'ethers';
import type {
  SnapshotAttestationPayload,
  SnapshotAttestationRecord,
  TrustSnapshot
} from '../types/domain.js';
import { stableHash } from '../utils/hash.js';
import type { ShapedWeights } from './weights.js';

export function snapshotHash(snapshot: TrustSnapshot): string {
  return stableHash({ round: snapshot.round, entries: snapshot.entries });
}

function payloadForSnapshot(snapshot: TrustSnapshot, weights: ShapedWeights): SnapshotAttestationPayload {
  return {
    round: snapshot.round,
    snapshotHash: snapshotHash(snapshot),
    participantIds: [...weights.participantIds],
    weights: [...weights.weights],
    createdAt: snapshot.createdAt
  };
}

function payloadHash(payload: SnapshotAttestationPayload): string {
  return stableHash(payload);
}

function messageBytes(hashHex: string): Uint8Array {
  return ethers.getBytes(`0x${hashHex}`);
}

export async function signSnapshotAttestation(
  signer: ethers.BaseWallet,
  snapshot: TrustSnapshot,
  weights: ShapedWeights
): Promise<SnapshotAttestationRecord> {
  const payload = payloadForSnapshot(snapshot, weights);
  const hash = payloadHash(payload);
  const signature = await signer.signMessage(messageBytes(hash));

  return {
    round: snapshot.round,
    signerAddress: signer.address,
    signature,
    signatureType: 'eip191',
    payloadHash: hash,
    payload,
    createdAt: new Date().toISOString()
  };
}
