/**
 * Field Encoder Interface
 * Layer: Domain
 *
 * The capability a host framework (or a nested object) uses to report typed
 * key/value pairs. One method per value kind, so each kind gets its natural
 * text form without the encoder guessing from a runtime type.
 */
import type { ILogMarshaler } from '@domain/interfaces/ILogMarshaler';
import type { IntegerLike } from '@shared/types';

export interface IFieldEncoder {
  addString(key: string, value: string): void;
  addBool(key: string, value: boolean): void;
  addInt(key: string, value: IntegerLike): void;
  addUint(key: string, value: IntegerLike): void;
  /** Pointer-sized value, rendered as `0x`-prefixed hex. */
  addUintptr(key: string, value: IntegerLike): void;
  addFloat(key: string, value: number): void;
  /** Throws whatever `value.marshalLog` throws, after closing the frame. */
  addMarshaler(key: string, value: ILogMarshaler): void;
  /** Anything else, via generic structural stringification. */
  addObject(key: string, value: unknown): void;
}
