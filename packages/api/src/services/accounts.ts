import { eq } from "drizzle-orm";

import type { Db } from "../db/index.js";
import { userEmails } from "../db/schema/index.js";
import type { AccountEmail } from "../gpg/identities.js";

/** The slice of the account system the keyring depends on. */
export interface AccountDirectory {
  listEmails(ownerId: string): Promise<AccountEmail[]>;
  isAdmin(userId: string): Promise<boolean>;
}

export function createDbAccountDirectory(db: Db): AccountDirectory {
  return {
    async listEmails(ownerId) {
      return db
        .select({ email: userEmails.email, isVerified: userEmails.isVerified })
        .from(userEmails)
        .where(eq(userEmails.userId, ownerId));
    },

    async isAdmin(userId) {
      const user = await db.query.users.findFirst({
        where: (t, { eq }) => eq(t.id, userId),
        columns: { isAdmin: true },
      });
      return user?.isAdmin ?? false;
    },
  };
}
