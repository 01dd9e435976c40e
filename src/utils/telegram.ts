import { logger as rootLogger, type Logger } from "./logger";
import { TTLCache, type Clock } from "./cache";

/** `telegram.getChatMember`, reduced to what the admin check reads. */
export type MemberLookup = (chatId: number, userId: number) => Promise<{ status: string }>;

const ADMIN_STATUSES = new Set(["administrator", "creator"]);

export const isGroupChat = (type: string | undefined) => type === "group" || type === "supergroup";

/** Admin lookups with a short cache; a failed lookup answers "not admin" and is not cached. */
export class AdminChecker {
  private cache: TTLCache<boolean>;

  constructor(
    private readonly lookup: MemberLookup,
    ttlMs = 60_000,
    now: Clock = Date.now,
    private readonly log: Logger = rootLogger.child({ module: "admin-check" })
  ) {
    this.cache = new TTLCache<boolean>(ttlMs, now);
  }

  async isAdmin(chatId: number, userId: number): Promise<boolean> {
    try {
      return await this.cache.with(`${chatId}:${userId}`, async () => {
        const member = await this.lookup(chatId, userId);
        return ADMIN_STATUSES.has(member.status);
      });
    } catch (e) {
      this.log.warn({ err: e, chatId, userId }, "Admin lookup failed");
      return false;
    }
  }
}
