import type { FastifyPluginAsync } from "fastify";

import { toRouteHandler } from "../handler/dispatch";
import { getMe, getVersion } from "../handler/users";
import { HeaderIdentityResolver, type IdentityResolver } from "../service/identity";
import type { UserStore } from "../store/annotation_store";

export type UserRoutesOptions = {
  users: UserStore;
  version: string;
  identity?: IdentityResolver;
};

export const userRoutes: FastifyPluginAsync<UserRoutesOptions> = async (app, opts) => {
  const identity = opts.identity ?? new HeaderIdentityResolver();

  app.get("/me", toRouteHandler(getMe({ users: opts.users, identity })));
  app.get("/version", toRouteHandler(getVersion(opts.version)));
};
