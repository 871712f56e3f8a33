export class DuplicateContactException extends Error {
  constructor(name: string) {
    super(`Contact with name '${name}' already exists`);
    this.name = 'DuplicateContactException';
  }
}
