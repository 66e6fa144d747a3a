export interface Principal {
  readonly teamId: string;
}

export interface CredentialVerifierPort {
  /** `null` when the credential is missing or not recognised. */
  verify(credential: string | null): Promise<Principal | null>;
}
