/**
 * Dependency graph records
 */

export interface FileRecord {
  id: number;
  absolutePath: string;
  /** Relative to the scan root, forward slashes */
  relativePath: string;
  /** File name without extension, lower-cased */
  baseName: string;
}

export interface OutgoingDetail {
  text: string;
  href: string;
  target: string;
}

export interface IncomingDetail {
  from: string;
  text: string;
  href: string;
}

export interface DependencyRecord {
  path: string;
  relativePath: string;
  /** Distinct target documents */
  outgoingFiles: number;
  /** Distinct source documents */
  incomingFiles: number;
  outgoingDetails: OutgoingDetail[];
  incomingDetails: IncomingDetail[];
}
