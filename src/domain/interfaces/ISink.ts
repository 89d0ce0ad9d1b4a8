/**
 * Sink Interface
 * Layer: Domain
 *
 * Destination for a rendered line. `write` receives the whole line in one
 * call and returns how many bytes it accepted; failures are thrown.
 *
 * The bytes are a view into a pooled buffer and are only valid for the
 * duration of the call. A sink that keeps them must copy.
 */
export interface ISink {
  write(bytes: Uint8Array): number;
}
