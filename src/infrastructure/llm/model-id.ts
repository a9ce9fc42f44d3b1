import { BadRequestError } from "../../domain/common/errors";
import type { ProviderModelId } from "./types";

export type ProviderLookup = {
  has(name: string): boolean;
};

function providerNotProvided(model: string): BadRequestError {
  return new BadRequestError({
    message: `LLM Provider NOT provided. Pass in the LLM provider you are trying to call. You passed model=${model}`,
  });
}

/**
 * Splits `<provider>/<vendor model>` on the first `/`. Only the routing
 * prefix is removed: `nvidia/nvidia/nv-embedqa-e5-v5` targets the vendor
 * model `nvidia/nv-embedqa-e5-v5`.
 */
export function parseModelId(
  model: string,
  providers: ProviderLookup,
): ProviderModelId {
  const separator = model.indexOf("/");
  if (separator <= 0) throw providerNotProvided(model);

  const provider = model.slice(0, separator);
  if (!providers.has(provider)) throw providerNotProvided(model);

  const vendorModel = model.slice(separator + 1);
  if (vendorModel.trim().length === 0) {
    throw new BadRequestError({
      provider,
      message: `Model "${model}" names provider "${provider}" but no model after it`,
    });
  }
  return { provider, vendorModel };
}
