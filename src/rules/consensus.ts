import type { ConsensusStatus } from './types';

// A missing slot can arrive stringified as "null"
function isPresentSlot(slot: string | null | undefined): boolean {
  return slot !== undefined && slot !== null && slot !== '' && slot !== 'null';
}

/**
 * A consensus client counts as functional only when it serves both the
 * finalized and the head header. Either one alone is a degraded node.
 */
export function validateConsensus(
  beaconFinalizedSlot?: string | null,
  beaconHeadSlot?: string | null
): ConsensusStatus {
  const beaconFinalityWorking = isPresentSlot(beaconFinalizedSlot);
  const beaconHeadWorking = isPresentSlot(beaconHeadSlot);

  return {
    beaconFinalityWorking,
    beaconHeadWorking,
    functional: beaconFinalityWorking && beaconHeadWorking,
  };
}
