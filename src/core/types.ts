export interface RawAddress {
  street: string;
  suite: string;
  city: string;
  zipcode: string;
}

export interface RawUserRecord {
  id: number;
  name: string;
  email: string;
  address: RawAddress;
}

export interface CleanUserRecord {
  id: number;
  name: string;
  email: string;
  full_address: string;
}

export interface TransformStats {
  input: number;
  malformed: number;
  invalid_email: number;
  duplicates: number;
  retained: number;
}

export interface TransformResult {
  records: CleanUserRecord[];
  stats: TransformStats;
}

export type EtlPhase = 'extract' | 'transform' | 'load' | 'validate';

export interface PipelineSummary {
  extracted: number;
  malformed: number;
  invalid_email: number;
  duplicates_removed: number;
  rows_written: number;
  output_path: string;
  duration_ms: number;
}

export const CSV_FIELDS = ['id', 'name', 'email', 'full_address'] as const;
