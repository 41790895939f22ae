/** Where a linear byte offset lands inside the quantum-set chain. */
export interface QuantumAddress {
  /** index of the quantum set in the chain */
  readonly set: number;
  /** slot inside that set */
  readonly slot: number;
  /** byte offset inside the quantum */
  readonly offset: number;
}

/**
 *  pos → (set, slot, offset) for a given geometry.
 *  Read and write both go through here so their offsets always agree.
 */
export function translate(pos: number, quantum: number, qset: number): QuantumAddress {
  const itemSize = quantum * qset;
  const rest = pos % itemSize;

  return {
    set: Math.floor(pos / itemSize),
    slot: Math.floor(rest / quantum),
    offset: rest % quantum,
  };
}
