
/*
  Thrown when a caller breaks a precondition of Sll or its positions,
    e.g. dereferencing end() or calling popFront() on an empty list.
*/
export class SllContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SllContractError';
  }
}
