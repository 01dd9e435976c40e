import { z } from "zod";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import type { KvStore } from "./kvStore";
import { CorruptRecordError, STORE_OK, storeFailure, type StoreResult } from "./result";

export const USER_GROUP_LINKS_KEY = "user_group_links";

const LinkTableSchema = z.record(z.number().int());
type LinkTable = z.infer<typeof LinkTableSchema>;

/**
 * Which group a user's anonymous questions go to. The whole table lives in a
 * single reserved row and is rewritten as a unit.
 */
export class UserGroupLinkStore {
  constructor(
    private readonly kv: KvStore,
    private readonly log: Logger = rootLogger.child({ module: "user-group-links" })
  ) {}

  get(userId: number): number | null {
    if (!Number.isSafeInteger(userId)) return null;
    try {
      const table = LinkTableSchema.safeParse(this.kv.get(USER_GROUP_LINKS_KEY) ?? {});
      if (!table.success) {
        this.log.warn("Link table is corrupt; treating every user as unlinked");
        return null;
      }
      return table.data[String(userId)] ?? null;
    } catch (e) {
      this.log.error({ err: e, userId }, "Could not read link table");
      return null;
    }
  }

  set(userId: number, groupId: number): StoreResult {
    if (!Number.isSafeInteger(userId) || !Number.isSafeInteger(groupId)) {
      return storeFailure("invalid_id", "User and group ids must be integers");
    }
    return this.mutate((table) => {
      table[String(userId)] = groupId;
      return true;
    });
  }

  remove(userId: number): StoreResult {
    if (!Number.isSafeInteger(userId)) {
      return storeFailure("invalid_id", "User id must be an integer");
    }
    return this.mutate((table) => {
      const key = String(userId);
      if (!(key in table)) return false;
      delete table[key];
      return true;
    });
  }

  /** `fn` returns whether it changed the table; unchanged tables are not rewritten. */
  private mutate(fn: (table: LinkTable) => boolean): StoreResult {
    try {
      this.kv.exclusive(() => {
        const table = this.readForWrite();
        if (fn(table)) this.kv.put(USER_GROUP_LINKS_KEY, table);
      });
      return STORE_OK;
    } catch (e) {
      if (e instanceof CorruptRecordError) {
        this.log.error(e.message);
        return storeFailure("corrupt", e.message);
      }
      this.log.error({ err: e }, "Link table write failed");
      return storeFailure("io", errorMessage(e));
    }
  }

  private readForWrite(): LinkTable {
    let raw: unknown;
    try {
      raw = this.kv.get(USER_GROUP_LINKS_KEY);
    } catch (e) {
      if (e instanceof SyntaxError) throw new CorruptRecordError(USER_GROUP_LINKS_KEY, e.message);
      throw e;
    }
    if (raw === undefined) return {};
    const parsed = LinkTableSchema.safeParse(raw);
    if (!parsed.success) throw new CorruptRecordError(USER_GROUP_LINKS_KEY, "not a user → group map");
    return parsed.data;
  }
}
