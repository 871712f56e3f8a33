export class ContactNotFoundException extends Error {
  constructor(name: string) {
    super(`Contact with name '${name}' not found in address book`);
    this.name = 'ContactNotFoundException';
  }
}
