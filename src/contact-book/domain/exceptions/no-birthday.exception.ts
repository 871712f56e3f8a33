export class NoBirthdayException extends Error {
  constructor(name: string) {
    super(`Contact ${name} has no birthday set`);
    this.name = 'NoBirthdayException';
  }
}
