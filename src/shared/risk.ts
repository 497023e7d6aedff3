import type { RiskLevel } from './types.js';

export const RISK_ORDER: readonly RiskLevel[] = ['low', 'medium', 'high', 'critical'];

export function riskRank(level: RiskLevel): number {
  return RISK_ORDER.indexOf(level);
}

export function compareRisk(a: RiskLevel, b: RiskLevel): number {
  return riskRank(a) - riskRank(b);
}

export function isRiskAtMost(level: RiskLevel, ceiling: RiskLevel): boolean {
  return compareRisk(level, ceiling) <= 0;
}

export function isRiskLevel(value: unknown): value is RiskLevel {
  return typeof value === 'string' && (RISK_ORDER as readonly string[]).includes(value);
}

export function parseRiskLevel(value: string): RiskLevel | null {
  const lower = value.trim().toLowerCase();
  return isRiskLevel(lower) ? lower : null;
}
