export class RiderNotFoundError extends Error {
  constructor(public readonly query: string) {
    super(`Rider not found: ${query}`);
    this.name = 'RiderNotFoundError';
  }
}

export class EditRejectedError extends Error {
  constructor(reason: string) {
    super(`Edit rejected: ${reason}`);
    this.name = 'EditRejectedError';
  }
}
