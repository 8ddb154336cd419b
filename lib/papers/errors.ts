/**
 * Source data the migrator cannot map (unknown type, role or label code)
 */
export class UnsupportedSourceDataError extends Error {
  constructor(
    message: string,
    public readonly kind: 'pubType' | 'authorRole' | 'label' | 'idSource',
    public readonly code: string | number | null
  ) {
    super(message);
    this.name = 'UnsupportedSourceDataError';
    Object.setPrototypeOf(this, UnsupportedSourceDataError.prototype);
  }
}
