import { PolicySpec } from '../bgp/types';
import { DeviceSession } from '../device/session';

export interface PolicyBlock {
    policy: PolicySpec;
    statements: string[]; // leading '#' comment, then the compiled statements
}

export interface DeploymentOutcome {
    router: string;
    address: string | null;
    success: boolean;
    output: string; // raw device transcript or diagnostic, verbatim
    configFile: string | null;
    manualCommitRequired: boolean;
    policiesSucceeded: number;
    policiesFailed: number;
}

export interface PendingConfirmation {
    router: string;
    address: string;
    session: DeviceSession; // kept open: never disconnected inside the rollback window
    appliedAt: Date;
    confirmMinutes: number;
}

export interface DeploymentRun {
    outcomes: readonly DeploymentOutcome[];
    policiesSucceeded: number;
    policiesFailed: number;
    pendingConfirmations: PendingConfirmation[];
}

export type FollowUpAction = 'commit' | 'rollback';

export interface FollowUpOutcome {
    router: string;
    address: string;
    action: FollowUpAction;
    success: boolean;
    output: string;
}

export interface FollowUpSummary {
    outcomes: FollowUpOutcome[];
    succeeded: number;
    failed: number;
}
