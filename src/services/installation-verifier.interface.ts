export interface VerificationCheck {
  name: string;
  ok: boolean;
  message: string;
}

export interface VerificationReport {
  ok: boolean;
  checks: VerificationCheck[];
}

/**
 * Checks that a configured installation can reach everything the agent uses.
 */
export interface IInstallationVerifier {
  verify(): Promise<VerificationReport>;
}
