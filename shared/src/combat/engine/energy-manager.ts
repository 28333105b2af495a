/**
 * Combat - Energy Manager
 *
 * Per-side energy and grog. Energy refills at the start of a side's turn
 * and pays for attacks, moves and abilities; whatever is left at the end
 * of the turn is converted into grog, which buys rum.
 */

import type { CombatConfig } from "../types/config";

export interface EnergyPool {
  current: number;
  /** Refill target for the coming turn */
  max: number;
  grog: number;
  /** Energy earned while the other side acts; paid out at the next refill */
  banked: number;
}

export function createEnergyPool(config: CombatConfig): EnergyPool {
  return { current: 0, max: config.energyPerTurn, grog: 0, banked: 0 };
}

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

export interface PoolResult {
  /** Whether the operation went through */
  success: boolean;
  /** Pool after the operation */
  updatedPool: EnergyPool;
  /** Amount actually moved */
  amount: number;
  /** Reason for failure if unsuccessful */
  failureReason?: string;
  /** Audit trail */
  audit: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// ENERGY
// ═══════════════════════════════════════════════════════════════════════════

/** All or nothing: an unaffordable cost changes nothing. */
export function spendEnergy(pool: EnergyPool, amount: number, source: string): PoolResult {
  if (amount <= 0) {
    return { success: true, updatedPool: pool, amount: 0, audit: `${source}: no energy cost` };
  }

  if (pool.current < amount) {
    return {
      success: false,
      updatedPool: pool,
      amount: 0,
      failureReason: `Insufficient energy: ${pool.current}/${amount}`,
      audit: `${source}: FAILED - insufficient energy (${pool.current}/${amount})`,
    };
  }

  const current = pool.current - amount;
  return {
    success: true,
    updatedPool: { ...pool, current },
    amount,
    audit: `${source}: -${amount} energy (${pool.current} → ${current})`,
  };
}

/** Gives energy back, never past the pool's max. */
export function refundEnergy(pool: EnergyPool, amount: number, source: string): PoolResult {
  const current = Math.max(pool.current, Math.min(pool.max, pool.current + Math.max(0, amount)));
  const restored = current - pool.current;
  return {
    success: restored > 0,
    updatedPool: { ...pool, current },
    amount: restored,
    audit: `${source}: +${restored} energy (${pool.current} → ${current})`,
  };
}

/** Holds energy for a side that is not acting until its next refill. */
export function bankEnergy(pool: EnergyPool, amount: number, source: string): PoolResult {
  const banked = pool.banked + Math.max(0, amount);
  return {
    success: banked > pool.banked,
    updatedPool: { ...pool, banked },
    amount: banked - pool.banked,
    audit: `${source}: +${banked - pool.banked} energy banked (${banked} for next turn)`,
  };
}

/** Takes up to `amount`, stopping at zero. */
export function drainEnergy(pool: EnergyPool, amount: number, source: string): PoolResult {
  return spendEnergy(pool, Math.min(pool.current, Math.max(0, amount)), source);
}

/**
 * Start-of-turn refill. Income is energyPerTurn plus the side's economy
 * modifiers, never below zero; banked energy comes on top.
 */
export function refillEnergy(pool: EnergyPool, config: CombatConfig, incomeModifier: number): PoolResult {
  const max = Math.max(0, config.energyPerTurn + incomeModifier);
  const current = max + pool.banked;
  const modifiers = incomeModifier !== 0 ? ` (${incomeModifier >= 0 ? "+" : ""}${incomeModifier} modifiers)` : "";
  const banked = pool.banked > 0 ? ` (+${pool.banked} banked)` : "";
  return {
    success: true,
    updatedPool: { ...pool, current, max, banked: 0 },
    amount: current - pool.current,
    audit: `Energy refilled to ${current}${modifiers}${banked}`,
  };
}

/** End-of-turn: unspent energy becomes grog. */
export function convertUnspentEnergy(pool: EnergyPool, config: CombatConfig): PoolResult {
  const grogGained = pool.current * config.grogPerUnspentEnergy;
  return {
    success: grogGained > 0,
    updatedPool: { ...pool, current: 0, grog: pool.grog + grogGained },
    amount: grogGained,
    audit: `${pool.current} unspent energy → +${grogGained} grog (${pool.grog + grogGained} total)`,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// GROG
// ═══════════════════════════════════════════════════════════════════════════

export function spendGrog(pool: EnergyPool, amount: number, source: string): PoolResult {
  if (pool.grog < amount) {
    return {
      success: false,
      updatedPool: pool,
      amount: 0,
      failureReason: `Insufficient grog: ${pool.grog}/${amount}`,
      audit: `${source}: FAILED - insufficient grog (${pool.grog}/${amount})`,
    };
  }
  return {
    success: true,
    updatedPool: { ...pool, grog: pool.grog - amount },
    amount,
    audit: `${source}: -${amount} grog (${pool.grog} → ${pool.grog - amount})`,
  };
}

export function addGrog(pool: EnergyPool, amount: number, source: string): PoolResult {
  return {
    success: true,
    updatedPool: { ...pool, grog: pool.grog + amount },
    amount,
    audit: `${source}: +${amount} grog`,
  };
}

/** Takes up to `amount` grog, stopping at zero. */
export function drainGrog(pool: EnergyPool, amount: number, source: string): PoolResult {
  return spendGrog(pool, Math.min(pool.grog, Math.max(0, amount)), source);
}
