import { Layer } from "effect";
import * as sts from "./sts";
import * as cloudformation from "./cloudformation";
import * as lambda from "./lambda";
import type { ClientOptions } from "./shared";

export { sts, cloudformation, lambda };
export type { ClientOptions };

/**
 * Build every client the deployment talks to, all scoped to the same region and profile.
 * Clients are destroyed when the layer's scope closes.
 */
export const makeClients = (options: ClientOptions) =>
  Layer.mergeAll(
    sts.layer(options),
    cloudformation.layer(options),
    lambda.layer(options)
  );
