export interface ICredentialService {
  /** Returns the bearer token, or an empty string for "no authentication". */
  acquire(): Promise<string>;
}
