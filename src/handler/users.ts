import { notFound } from "../serializer/http_error";
import { newUserResponse, newVersionResponse } from "../serializer/serializers";
import type { IdentityResolver } from "../service/identity";
import type { UserStore } from "../store/annotation_store";
import { withContext, type RequestProcessFunc } from "./dispatch";

export function getMe(deps: { users: UserStore; identity: IdentityResolver }): RequestProcessFunc {
  return async (req) => {
    const userId = deps.identity.getUserId(req);

    const user = await withContext("error fetching user", deps.users.getById(userId));
    if (!user) {
      throw notFound("user not found");
    }
    return newUserResponse(user);
  };
}

export function getVersion(version: string): RequestProcessFunc {
  return async () => newVersionResponse(version);
}
