// Codec constants and limits

/** Largest unsigned 64-bit argument. */
export const MAX_UINT64 = 0xffff_ffff_ffff_ffffn;

/** Count reported for indefinite-length containers. */
export const INDEFINITE_COUNT = -1;

/** Nesting ceiling for recursive walks over untrusted input. */
export const DEFAULT_MAX_DEPTH = 256;
