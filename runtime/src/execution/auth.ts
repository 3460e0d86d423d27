/**
 * Recognition of credential and permission failures in CLI stderr.
 *
 * @module
 */

export const AUTH_ERROR_SIGNATURES: readonly string[] = [
  'Unable to locate credentials',
  'ExpiredToken',
  'AccessDenied',
  'AuthFailure',
  'The security token included in the request is invalid',
];

/** `The config profile (name) could not be found` */
export const UNKNOWN_PROFILE_PATTERN = /The config profile \([^)]*\) could not be found/;

export const AUTH_ERROR_PREFIX = 'Authentication error:';

export const AUTH_REMEDIATION_HINT =
  'Please check your AWS credentials and ensure they are properly configured ' +
  '(run `aws configure`, set AWS_PROFILE, or provide AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY).';

export const NO_ERROR_OUTPUT_MESSAGE = 'Command failed with no error output';

export function isAuthError(stderr: string): boolean {
  return (
    AUTH_ERROR_SIGNATURES.some((signature) => stderr.includes(signature)) ||
    UNKNOWN_PROFILE_PATTERN.test(stderr)
  );
}

/** Diagnostic for a non-zero exit, with a remediation hint for auth failures. */
export function describeFailure(stderr: string): string {
  if (isAuthError(stderr)) {
    return `${AUTH_ERROR_PREFIX} ${stderr.trim()}\n${AUTH_REMEDIATION_HINT}`;
  }
  return stderr.trim().length > 0 ? stderr : NO_ERROR_OUTPUT_MESSAGE;
}
