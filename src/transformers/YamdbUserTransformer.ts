import { IYamdbUser } from "../api/structures/IYamdbUser";
import { YamdbUser } from "../database/entities/YamdbUser";

export namespace YamdbUserTransformer {
  export const transform = (user: YamdbUser): IYamdbUser => ({
    username: user.username,
    email: user.email,
    first_name: user.first_name,
    last_name: user.last_name,
    bio: user.bio,
    role: user.role,
  });
}
