export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A bill already exists for this slot and rental period.
 */
export class SlotOccupiedError extends DomainError {
  constructor(
    public readonly slot: string,
    public readonly month: string,
    public readonly year: string
  ) {
    super(`Slot ${slot} is already occupied for ${month} ${year}!`);
  }
}
