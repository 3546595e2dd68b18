import type { Handler } from "../router/router";

export const homeHandler: Handler = async () => ({ status: "OK" });
