import { Effect } from "effect";
import { sts } from "./clients";

export type CallerIdentity = {
  account: string;
  arn: string;
  userId: string;
};

/**
 * Resolve who the current credentials belong to. Read-only; fails when they cannot authenticate.
 */
export const getCallerIdentity = () =>
  sts.getCallerIdentity().pipe(
    Effect.map((r): CallerIdentity => ({
      account: r.Account ?? "",
      arn: r.Arn ?? "",
      userId: r.UserId ?? "",
    }))
  );
