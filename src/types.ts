// Major type RFC: https://www.rfc-editor.org/rfc/rfc7049#section-2.1

/** The high-order three bits of a header byte. */
export enum Major {
  UnsignedInteger = 0,
  NegativeInteger = 1,
  ByteString = 2,
  TextString = 3,
  Array = 4,
  Map = 5,
  Tag = 6,
  /** Simple values, floating point numbers and the break signal. */
  Etc = 7,
}

/**
 * How the low five bits of a header byte encode the argument. Enum values are
 * the low-order bits each format uses; immediate values occupy 0 through 23.
 */
export enum InfoFormat {
  Immediate = 0,
  Byte = 24,
  Short = 25,
  Int = 26,
  Long = 27,
  Indefinite = 31,
}

/**
 * Classification of a header that merges integer signs and breaks out the
 * simple values, floats and indefinite container starts.
 */
export enum LogicalType {
  Integral = "integral",
  Boolean = "boolean",
  Null = "null",
  Undefined = "undefined",
  OtherSimple = "other-simple",
  Tag = "tag",
  HalfFloat = "half-float",
  Float = "float",
  Double = "double",
  BinaryChunk = "binary-chunk",
  TextChunk = "text-chunk",
  StartBinaryChunks = "start-binary-chunks",
  StartTextChunks = "start-text-chunks",
  StartArray = "start-array",
  StartIndefiniteArray = "start-indefinite-array",
  StartMap = "start-map",
  StartIndefiniteMap = "start-indefinite-map",
  Break = "break",
}

/** Number of argument bytes following the header byte for each format. */
export const ARGUMENT_BYTES: Readonly<Record<InfoFormat, number>> = {
  [InfoFormat.Immediate]: 0,
  [InfoFormat.Byte]: 1,
  [InfoFormat.Short]: 2,
  [InfoFormat.Int]: 4,
  [InfoFormat.Long]: 8,
  [InfoFormat.Indefinite]: 0,
};

export function majorName(major: Major): string {
  return Major[major];
}

export function formatName(format: InfoFormat): string {
  return InfoFormat[format];
}
