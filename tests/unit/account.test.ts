import { describe, expect, it } from "vitest";
import { creditCharge, isPremiumActive } from "../../src/domain/account";
import { InsufficientCreditsError } from "../../src/domain/errors";

const now = new Date("2024-06-01T12:00:00Z");

describe("account credits", () => {
  it("treats premium as active until it expires", () => {
    expect(isPremiumActive({ isPremium: true, premiumExpiresAt: null }, now)).toBe(true);
    expect(isPremiumActive({ isPremium: true, premiumExpiresAt: new Date("2024-07-01T00:00:00Z") }, now)).toBe(true);
    expect(isPremiumActive({ isPremium: true, premiumExpiresAt: new Date("2024-05-01T00:00:00Z") }, now)).toBe(false);
    expect(isPremiumActive({ isPremium: false, premiumExpiresAt: null }, now)).toBe(false);
  });

  it("charges nothing for active premium accounts", () => {
    expect(creditCharge({ id: "u1", credits: 0, isPremium: true }, 10, now)).toBe(0);
  });

  it("charges the cost when the balance covers it", () => {
    expect(creditCharge({ id: "u1", credits: 10, isPremium: false }, 10, now)).toBe(10);
  });

  it("refuses when the balance is short", () => {
    expect(() => creditCharge({ id: "u1", credits: 9, isPremium: false }, 10, now)).toThrow(InsufficientCreditsError);
    expect(() =>
      creditCharge({ id: "u1", credits: 5, isPremium: true, premiumExpiresAt: new Date("2024-01-01T00:00:00Z") }, 10, now)
    ).toThrow("Insufficient credits.");
  });
});
