/** Reason codes for rejected kernel arguments. */
export type KernelErrorReason = "length_mismatch";

/** Error thrown when a kernel is called with incompatible inputs. */
export class KernelError extends Error {
  constructor(
    readonly kernel: string,
    readonly reason: KernelErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "KernelError";
  }
}
