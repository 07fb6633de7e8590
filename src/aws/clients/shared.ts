import { fromIni } from "@aws-sdk/credential-providers";

export type ClientOptions = {
  region: string;
  /** Named profile from the shared AWS config files; ambient credentials when omitted */
  profile?: string;
};

export const toClientConfig = ({ region, profile }: ClientOptions) => ({
  region,
  ...(profile ? { credentials: fromIni({ profile }) } : {}),
});

export const errorName = (cause: unknown): string | undefined =>
  cause instanceof Error ? cause.name : undefined;

export const errorMessage = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
