/**
 * Identity of a resource: `resourceType.name`.
 * Counted instances keep their index in the name, e.g. `aws_subnet.public[1]`.
 */
export class Address {
  public readonly resourceType: string;
  public readonly name: string;

  constructor(resourceType: string, name: string) {
    this.resourceType = resourceType;
    this.name = name;
  }

  static parse(input: string): Address {
    const separator = input.indexOf('.');
    if (separator <= 0 || separator === input.length - 1) throw new Error(`Invalid address format: ${input} (expected type.name)`);

    const resourceType = input.slice(0, separator);
    const name = input.slice(separator + 1);
    if (name.includes('.')) throw new Error(`Invalid address format: ${input} (expected type.name)`);

    return new Address(resourceType, name);
  }

  static of(resource: { resourceType: string; name: string }): Address {
    return new Address(resource.resourceType, resource.name);
  }

  /** Orders by resource type, then by name */
  static compare(a: Address, b: Address): number {
    if (a.resourceType !== b.resourceType) return a.resourceType < b.resourceType ? -1 : 1;
    if (a.name !== b.name) return a.name < b.name ? -1 : 1;
    return 0;
  }

  /** Same ordering as `compare`, on rendered addresses */
  static compareKeys(a: string, b: string): number {
    return Address.compare(Address.parse(a), Address.parse(b));
  }

  toString(): string {
    return `${this.resourceType}.${this.name}`;
  }
}
