/**
 * Log Marshaler Interface
 * Layer: Domain
 *
 * A value that knows how to describe itself as fields. The encoder hands it
 * the same IFieldEncoder it is accumulating into; whatever the marshaler adds
 * lands inside a `{...}` frame under the key it was registered with.
 */
import type { IFieldEncoder } from '@domain/interfaces/IFieldEncoder';

export interface ILogMarshaler {
  marshalLog(encoder: IFieldEncoder): void;
}
