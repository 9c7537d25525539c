/**
 * Error classes raised by the SMILES generator
 */

import type { BondType } from 'types';

export class MissingCoordinatesError extends Error {
  public atomIndex: number;

  constructor(atomIndex: number) {
    super(`Atom number ${atomIndex} has no 2D coordinates; chiral SMILES needs a depiction`);
    this.name = 'MissingCoordinatesError';
    this.atomIndex = atomIndex;
    Object.setPrototypeOf(this, MissingCoordinatesError.prototype);
  }
}

export class UnrepresentableBondOrderError extends Error {
  public bondType: BondType;
  public atom1: number;
  public atom2: number;

  constructor(bondType: BondType, atom1: number, atom2: number) {
    super(`Bond ${atom1}-${atom2} of type '${bondType}' has no SMILES bond symbol`);
    this.name = 'UnrepresentableBondOrderError';
    this.bondType = bondType;
    this.atom1 = atom1;
    this.atom2 = atom2;
    Object.setPrototypeOf(this, UnrepresentableBondOrderError.prototype);
  }
}

export class NoStartAtomError extends Error {
  constructor(message: string = 'No atom carries canonical rank 1') {
    super(message);
    this.name = 'NoStartAtomError';
    Object.setPrototypeOf(this, NoStartAtomError.prototype);
  }
}

export class InvalidCanonicalRankError extends Error {
  public atomId: number;
  public rank?: number;

  constructor(atomId: number, rank: number | undefined, reason: string) {
    super(`Atom ${atomId} has invalid canonical rank ${rank ?? '(none)'}: ${reason}`);
    this.name = 'InvalidCanonicalRankError';
    this.atomId = atomId;
    this.rank = rank;
    Object.setPrototypeOf(this, InvalidCanonicalRankError.prototype);
  }
}
