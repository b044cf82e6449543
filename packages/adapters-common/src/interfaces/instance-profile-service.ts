/**
 * Interface for binding a role to instances through an instance profile.
 * Implemented by the AWS IAM instance profile service.
 */
export interface IInstanceProfileService {
  /**
   * Return the name of a profile that carries `roleName`, creating one named
   * exactly `roleName` (with that role attached) when none exists.
   *
   * Lookup and creation are not atomic.
   */
  getOrCreate(roleName: string): Promise<string>;
}
