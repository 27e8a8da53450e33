// Per-cycle snapshot of the build server's resource graph; nothing here is persisted

export interface BrokenBuildRef {
  href: string;
}

export interface BuildTypeRef {
  href?: string;
  name?: string;
}

export interface BuildDetail {
  buildType?: BuildTypeRef;
  triggeredBy?: string; // only set for user-triggered builds
}

export interface BuildTypeDetail {
  investigationsHref?: string;
}

export interface InvestigationRecord {
  state: string;
  assignee?: string;
}

export interface ResponsibilityVerdict {
  buildRef: BrokenBuildRef;
  buildTypeName?: string;
  triggeredBy?: string;
  investigationState?: string;
  assignee?: string;
  taken: boolean;
}

export interface DetectionReport {
  brokenBuilds: BrokenBuildRef[];
  verdicts: ResponsibilityVerdict[];
  unacknowledged: BrokenBuildRef[];
}

export type SirenCommand = 'SIREN_ON' | 'SIREN_OFF';

export type CycleState =
  | 'IDLE'
  | 'CHECKING_HOURS'
  | 'SUPPRESSED'
  | 'DETECTING'
  | 'DECIDING'
  | 'SIGNALING';
