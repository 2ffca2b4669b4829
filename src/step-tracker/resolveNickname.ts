// Resolves the nickname a report is filed under, keeping the user's stored profile in sync.

import { ProfileStore, UserId } from "./stores";

/**
 * Returns the nickname for a report.
 * A nickname parsed from the message wins and refreshes the stored profile;
 * otherwise the nickname remembered for the user is used.
 * @param profiles Profile store
 * @param userId Author of the message (null if unknown)
 * @param parsedNickname Nickname found in the message text
 */
export async function resolveNickname(
  profiles: ProfileStore,
  userId: UserId | null,
  parsedNickname: string | null
): Promise<string | null> {
  if (parsedNickname) {
    if (userId !== null) {
      const profile = await profiles.findByUserId(userId);
      // Only write when something changed
      if (profile === null || profile.nickname !== parsedNickname) {
        await profiles.upsert({ userId, nickname: parsedNickname });
      }
    }
    return parsedNickname;
  }

  if (userId !== null) {
    const profile = await profiles.findByUserId(userId);
    return profile ? profile.nickname : null;
  }

  return null;
}
