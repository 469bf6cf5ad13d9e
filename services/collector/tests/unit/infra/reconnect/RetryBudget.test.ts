import { describe, expect, it } from 'vitest';
import { RetryBudget } from '@/infra/reconnect/RetryBudget';

describe('RetryBudget', () => {
  it('窓内の失敗が上限以下なら再試行を許可し、超えたら拒否する', () => {
    const budget = new RetryBudget(3, 60000, () => 0);

    expect([budget.tryConsume(), budget.tryConsume(), budget.tryConsume()]).toEqual([true, true, true]);
    expect(budget.tryConsume()).toBe(false);
  });

  it('窓の外に出た失敗は数えない', () => {
    let now = 0;
    const budget = new RetryBudget(2, 60000, () => now);

    budget.tryConsume();
    budget.tryConsume();
    expect(budget.recentFailures).toBe(2);

    now = 60000;
    expect(budget.recentFailures).toBe(0);
    expect(budget.tryConsume()).toBe(true);
  });

  it('既定値は 60秒あたり 5回', () => {
    const budget = new RetryBudget(undefined, undefined, () => 1000);

    for (let i = 0; i < 5; i++) {
      expect(budget.tryConsume()).toBe(true);
    }
    expect(budget.tryConsume()).toBe(false);
  });
});
