import { isValidAssetName, type SignedUrl } from "../assets/assetStore";
import type { RequestContext } from "../router/context";
import { InvalidArgumentError } from "../router/errors";
import type { Handler } from "../router/router";

function assetName(ctx: RequestContext): string {
  const raw = ctx.pathParams[0] ?? "";
  let name: string;
  try {
    name = decodeURIComponent(raw);
  } catch {
    throw new InvalidArgumentError("asset name is not valid percent-encoding", { name: raw });
  }
  if (!isValidAssetName(name)) {
    throw new InvalidArgumentError("asset name is not valid", { name });
  }
  return name;
}

function requireAssetStore(ctx: RequestContext) {
  if (!ctx.assetStore) {
    throw new Error("asset store was not attached to the request");
  }
  return ctx.assetStore;
}

/** `GET files/<name>`: a signed download URL. */
export const assetGetUrlHandler: Handler = async (ctx): Promise<SignedUrl> => {
  const name = assetName(ctx);
  return requireAssetStore(ctx).signedGetUrl(name);
};

/** `PUT files/<name>`: a signed upload URL. */
export const assetUploadUrlHandler: Handler = async (ctx): Promise<SignedUrl> => {
  const name = assetName(ctx);
  return requireAssetStore(ctx).signedPutUrl(name);
};
