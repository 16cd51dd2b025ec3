/**
 * Environment variable access
 */

/**
 * Read an environment variable, treating blank values as unset.
 */
export const getEnvVariable = (key: string): string | undefined => {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
};
