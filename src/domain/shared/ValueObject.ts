/**
 * Base class for all Value Objects in the domain.
 * Value Objects are immutable and compared by their properties, not by identity.
 * Properties are frozen recursively on construction.
 */
export abstract class ValueObject<T extends object> {
  protected readonly props: Readonly<T>;

  protected constructor(props: T) {
    this.props = deepFreeze(props);
  }

  /**
   * Compares two value objects for equality based on their properties.
   */
  public equals(other: ValueObject<T> | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }
    return JSON.stringify(this.props) === JSON.stringify(other.props);
  }
}

/**
 * Freezes an object graph in place and returns it.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
  return Object.freeze(value);
}
