import type { AccountRecord } from "./types";
import { InsufficientCreditsError } from "./errors";

export function isPremiumActive(account: Pick<AccountRecord, "isPremium" | "premiumExpiresAt">, now = new Date()) {
  if (!account.isPremium) {
    return false;
  }
  if (!account.premiumExpiresAt) {
    return true;
  }
  return now.getTime() < account.premiumExpiresAt.getTime();
}

/** Credits to deduct for one job, or throws when the balance cannot cover it. */
export function creditCharge(account: AccountRecord, cost: number, now = new Date()) {
  if (isPremiumActive(account, now)) {
    return 0;
  }
  if (account.credits < cost) {
    throw new InsufficientCreditsError(cost, account.credits);
  }
  return cost;
}
