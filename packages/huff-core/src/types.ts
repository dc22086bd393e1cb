// One UTF-16 code unit of the input text (0..65535)
export type CodeUnit = number;
export type NodeId = number;
export type DocID = number;

export type FrequencyTable = ReadonlyMap<CodeUnit, number>;

export interface EncodedPayload { bitLength: number; bytes: Uint8Array; }

export interface Container { frequencies: FrequencyTable; payload: EncodedPayload; }

export interface CompressionStats {
  symbols: number; distinctSymbols: number; originalBytes: number;
  packedBytes: number; bitLength: number; ratio: number; averageCodeLength: number;
}
