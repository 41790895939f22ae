/*  Device storage layout                                         */
/*    device ─► set#0 ─► set#1 ─► … ─► null                       */
/*               └─ slots[0..qset)  each: Quantum | null          */
/*                     └─ data: Uint8Array(quantum)               */
/*  Sets appear lazily while walking to an index; slot arrays and */
/*  quanta appear on the first write that lands in them.          */

/** Fixed-size byte block, the smallest allocation unit. */
export interface Quantum {
  readonly handle: number;
  readonly data: Uint8Array;
}

export interface QuantumSlots {
  readonly handle: number;
  /** length is the qset in effect when the array was allocated */
  readonly items: Array<Quantum | null>;
}

export interface QuantumSet {
  readonly handle: number;
  slots: QuantumSlots | null;
  next: QuantumSet | null;
}

/** Count the sets reachable from `head`. */
export function chainLength(head: QuantumSet | null): number {
  let n = 0;
  for (let qs = head; qs; qs = qs.next) n++;
  return n;
}
