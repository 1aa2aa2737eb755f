import { type BasisAnalysis, overallRisk } from '../engine/SignalEngine.js';
import type { RiskFactor, Signal } from '../types/signals.js';

const RULE = '='.repeat(70);
const SUB_RULE = '-'.repeat(70);

const SIGNAL_MARKERS: Record<Signal, string> = {
  STRONG_ENTRY: '[+]',
  ACCEPTABLE_ENTRY: '[~]',
  NO_ENTRY: '[ ]',
  PARTIAL_EXIT: '[~]',
  FULL_EXIT: '[-]',
  STOP_LOSS: '[X]',
  HOLD: '[=]',
};

const RISK_LABELS: Record<RiskFactor, string> = {
  funding: 'Funding',
  basis: 'Basis',
  liquidity: 'Liquidity',
  crowding: 'Crowding',
  operational: 'Operational',
};

const RISK_FACTORS: readonly RiskFactor[] = ['funding', 'basis', 'liquidity', 'crowding', 'operational'];

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const count = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export function formatUsd(value: number): string {
  return usd.format(value);
}

export function formatPct(value: number, digits: number = 2): string {
  return `${(value * 100).toFixed(digits)}%`;
}

const row = (label: string, value: string) => `${label.padEnd(22)}${value}`;

/**
 * Text report of one snapshot's analysis
 */
export function formatAnalysisReport(analysis: BasisAnalysis): string {
  const { snapshot, metrics, returns, decision, risks, sizing } = analysis;
  const pairLabel = snapshot.pairId ? `[${snapshot.pairId}] ` : '';
  const lines: string[] = [
    RULE,
    `${pairLabel}BASIS TRADE ANALYSIS`,
    RULE,
    '',
    '[*] MARKET DATA',
    SUB_RULE,
    row('Spot Price:', formatUsd(snapshot.spotPrice)),
    row('Futures Price:', formatUsd(snapshot.futuresPrice)),
    row(
      'Futures Expiry:',
      `${snapshot.futuresExpiry.toISOString().slice(0, 10)} (${metrics.daysToExpiry} days)`,
    ),
  ];

  if (snapshot.etfPrice) {
    lines.push(row(`ETF Price (${snapshot.spotSymbol ?? 'ETF'}):`, formatUsd(snapshot.etfPrice)));
  }
  if (snapshot.etfNav) {
    lines.push(row('ETF NAV:', formatUsd(snapshot.etfNav)));
  }
  if (snapshot.sentimentIndex !== undefined) {
    lines.push(row('Fear & Greed Index:', snapshot.sentimentIndex.toFixed(2)));
  }
  if (snapshot.openInterest) {
    lines.push(row('Open Interest:', `${count.format(snapshot.openInterest)} contracts`));
  }

  lines.push(
    '',
    '[*] BASIS ANALYSIS',
    SUB_RULE,
    row('Basis (Absolute):', formatUsd(metrics.basisAbsolute)),
    row('Basis (Percent):', formatPct(metrics.basisPercent)),
    row('Monthly Basis:', formatPct(metrics.monthlyBasis)),
  );
  if (metrics.etfDiscountPremium !== undefined) {
    lines.push(row('ETF Disc/Premium:', formatPct(metrics.etfDiscountPremium)));
  }

  lines.push(
    '',
    '[*] RETURNS (ANNUALIZED)',
    SUB_RULE,
    row('Gross Return:', formatPct(returns.grossAnnualized)),
    row('Net Return:', formatPct(returns.netAnnualized)),
    row('Leveraged Return:', formatPct(returns.leveragedReturn)),
    '',
    '[*] SIGNAL',
    SUB_RULE,
    `${SIGNAL_MARKERS[decision.signal]} ${decision.signal}`,
    `    ${decision.reason}`,
    '',
    '[*] POSITION SIZING',
    SUB_RULE,
  );

  if (sizing.etfShares !== undefined) {
    lines.push(row(`${snapshot.spotSymbol ?? 'ETF'} Shares:`, `${count.format(sizing.etfShares)} (${formatUsd(sizing.spotValue)})`));
  } else {
    lines.push(row('Spot Value:', formatUsd(sizing.spotValue)));
  }
  lines.push(
    row('Futures Contracts:', `${sizing.futuresContracts} (${formatUsd(sizing.futuresValue)})`),
    row('Total Exposure:', formatUsd(sizing.totalExposure)),
    row('Delta Neutral:', sizing.deltaNeutral ? 'YES' : 'NO'),
  );
  if (sizing.overAllocated) {
    lines.push(row('Warning:', 'one-contract minimum exceeds futures target'));
  }

  lines.push('', `[*] RISK ASSESSMENT (${overallRisk(risks)})`, SUB_RULE);
  for (const factor of RISK_FACTORS) {
    const rating = risks[factor];
    lines.push(row(`${RISK_LABELS[factor]}:`, `${rating.level.toUpperCase()} - ${rating.note}`));
  }
  lines.push(RULE);

  return lines.join('\n');
}
