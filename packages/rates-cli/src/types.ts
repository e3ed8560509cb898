export type ReadCommand =
  | { kind: 'show-rates'; currency?: string; top?: number }
  | { kind: 'get-rate'; from: string; to: string }
  | { kind: 'history'; currency?: string; source?: string; limit?: number }
  | { kind: 'scheduler-status' };

export type WriteCommand = { kind: 'update-rates'; sources: string[] };

export type ParsedCommand = ReadCommand | WriteCommand;

export type CliOptions = {
  baseUrl: string;
  commandText: string;
};
