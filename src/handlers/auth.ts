import { ActionError } from "../router/errors";
import type { Handler } from "../router/router";

/** Revokes the access token the request was authenticated with. */
export const authLogoutHandler: Handler = async (ctx) => {
  if (ctx.principal.kind !== "user") {
    throw new ActionError("NotAuthenticated", "logout requires an access token");
  }
  if (!ctx.tokenStore) {
    throw new Error("token store was not attached to the request");
  }
  await ctx.tokenStore.delete(ctx.principal.accessToken);
  return { status: "OK" };
};
