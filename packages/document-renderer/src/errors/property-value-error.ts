/**
 * PropertyValueError
 *
 * Thrown by a property setter that rejects its value. The renderer catches it
 * per property and carries on with the rest of the document.
 */
export class PropertyValueError extends Error {
  readonly property: string;
  readonly value: unknown;

  constructor(property: string, value: unknown, reason: string) {
    super(`Invalid value ${JSON.stringify(value)} for "${property}": ${reason}`);
    this.name = 'PropertyValueError';
    this.property = property;
    this.value = value;
  }
}
