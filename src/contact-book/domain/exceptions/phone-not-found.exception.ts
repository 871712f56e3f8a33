export class PhoneNotFoundException extends Error {
  constructor(phone: string, name: string) {
    super(`Phone ${phone} not found in contact ${name}`);
    this.name = 'PhoneNotFoundException';
  }
}
