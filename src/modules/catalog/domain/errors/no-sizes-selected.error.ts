export class NoSizesSelectedError extends Error {
  constructor() {
    super('At least one size must be selected');
    this.name = 'NoSizesSelectedError';
  }
}
