export type Vec3 = {
  x: number;
  y: number;
  z: number;
};

export type Box3 = {
  min: Vec3;
  max: Vec3;
};

export type DifficultyTier = 0 | 1 | 2 | 3;

export type MotionLaw =
  | { type: 'static' }
  | { type: 'linear'; displacement: Vec3; period: number }
  | { type: 'circular'; radius: number; angularSpeed: number; phase: number };

export type Obstacle =
  | { kind: 'sphere'; center: Vec3; radius: number; motion: MotionLaw }
  | { kind: 'box'; center: Vec3; halfExtents: Vec3; motion: MotionLaw }
  | { kind: 'cylinder'; center: Vec3; radius: number; height: number; motion: MotionLaw };

export type GoalSpec = {
  position: Vec3;
  motion: MotionLaw;
};

export type ChallengeSpec = {
  id: string;
  seed: number;
  tier: DifficultyTier;
  worldBounds: Box3;
  start: Vec3;
  obstacles: Obstacle[];
  goal: GoalSpec;
  noFlyZones: Box3[];
  physicsStep: number;
  horizon: number;
  gravity: number;
  drag: number;
  wind: Vec3;
  captureRadius: number;
  captureDwell: number;
  nominalSpeed: number;
  bestTime: number;
};

export type ControlSample = {
  t: number;
  thrust: Vec3;
  yawRate: number;
};

export type CapabilityProfile = {
  model: string;
  mass: number;
  maxThrust: number;
  maxYawRate: number;
  batteryCapacity: number;
};

export type FlightPlan = {
  challengeId: string;
  controlSequence: ControlSample[];
  declaredCapability: CapabilityProfile;
};

export type TerminationReason = 'goal' | 'timeout' | 'collision' | 'battery-depleted' | 'invalid-input';

export type ScoringContext = {
  tier: DifficultyTier;
  horizon: number;
  bestTime: number;
  batteryCapacity: number;
  initialDistance: number;
};

export type ReplayResult = {
  goalReached: boolean;
  timeToGoal: number | null;
  energyUsed: number;
  collided: boolean;
  outOfBounds: boolean;
  terminationReason: TerminationReason;
  elapsed: number;
  closestApproach: number;
  clampedSamples: number;
  invalidReason?: string;
  scoring: ScoringContext;
};

export type TrustEntry = {
  trust: number;
  lastRound: number;
};

export type TrustSnapshotEntry = TrustEntry & {
  participantId: string;
};

export type TrustSnapshot = {
  round: number;
  entries: readonly TrustSnapshotEntry[];
  createdAt: string;
};

/** Participant id to trust entry, the persisted form of the trust state. */
export type TrustMapping = Record<string, TrustEntry>;

export type TrustCheckpoint = {
  round: number;
  entries: TrustMapping;
};

export const ROUND_PHASES = [
  'idle',
  'generating',
  'dispatching',
  'collecting',
  'replaying',
  'scoring',
  'aggregating',
  'publishing',
  'sleeping'
] as const;

export type RoundPhase = (typeof ROUND_PHASES)[number];

export type ParticipantOutcome = {
  participantId: string;
  responded: boolean;
  score: number;
  terminationReason?: TerminationReason;
  timeToGoal?: number | null;
  energyUsed?: number;
  error?: string;
};

export const ROUND_STATUSES = ['published', 'abandoned'] as const;

export type RoundStatus = (typeof ROUND_STATUSES)[number];

export type RoundRecord = {
  id: string;
  round: number;
  status: RoundStatus;
  seed: number;
  tier: DifficultyTier;
  challengeId?: string;
  failedPhase?: RoundPhase;
  reason?: string;
  phases: RoundPhase[];
  outcomes: ParticipantOutcome[];
  publicationRef?: string;
  startedAt: string;
  finishedAt: string;
};

export type ParticipantProfile = {
  id: string;
  endpoint: string;
  apiKey?: string;
};

export type RegisteredParticipant = ParticipantProfile & {
  enabled: boolean;
  metadata?: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
};

export type PublishReceipt = {
  ok: boolean;
  reason?: string;
  reference?: string;
};

export type SnapshotAttestationPayload = {
  round: number;
  snapshotHash: string;
  participantIds: string[];
  weights: number[];
  createdAt: string;
};

export type SnapshotAttestationRecord = {
  round: number;
  signerAddress: string;
  signature: string;
  signatureType: 'eip191';
  payloadHash: string;
  payload: SnapshotAttestationPayload;
  createdAt: string;
};
