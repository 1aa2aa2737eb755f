/**
 * Property-based tests for signal generation and trade actions
 */

import * as fc from 'fast-check';
import { DEFAULT_STRATEGY_CONFIG } from '@basis-desk/shared';
import { SignalEngine } from '../../src/engine/SignalEngine.js';
import { determineAction } from '../../src/execution/ExecutionManager.js';
import { SIGNALS, SIGNAL_THRESHOLDS, type Signal } from '../../src/types/signals.js';
import { manualClock, snapshot } from '../helpers/fixtures.js';

const engine = new SignalEngine(DEFAULT_STRATEGY_CONFIG, manualClock());

const basisArb = fc.double({ min: -0.2, max: 0.2, noNaN: true });
const daysArb = fc.integer({ min: 1, max: 365 });
const spotArb = fc.integer({ min: 1_000, max: 200_000 });

/** Expected signal for a snapshot without ETF or sentiment data */
function classify(monthly: number): Signal {
  const fundingMonthly = DEFAULT_STRATEGY_CONFIG.fundingCostAnnual / 12;
  if (monthly < 0 || monthly < SIGNAL_THRESHOLDS.compressedMonthly || monthly < fundingMonthly) return 'STOP_LOSS';
  if (monthly > SIGNAL_THRESHOLDS.peakMonthly) return 'FULL_EXIT';
  if (monthly > SIGNAL_THRESHOLDS.elevatedMonthly) return 'PARTIAL_EXIT';
  if (monthly > SIGNAL_THRESHOLDS.strongEntryMonthly) return 'STRONG_ENTRY';
  if (monthly > DEFAULT_STRATEGY_CONFIG.minMonthlyBasis) return 'ACCEPTABLE_ENTRY';
  return 'NO_ENTRY';
}

describe('SignalEngine Property Tests', () => {
  test('Property 1: Signal generation is deterministic', () => {
    fc.assert(
      fc.property(basisArb, daysArb, spotArb, (basis, days, spot) => {
        const s = snapshot(basis, { spotPrice: spot }, days);
        expect(engine.generateSignal(s)).toEqual(engine.generateSignal(s));
      }),
      { numRuns: 200 },
    );
  });

  test('Property 2: Signal follows the monthly basis thresholds', () => {
    fc.assert(
      fc.property(basisArb, daysArb, spotArb, (basis, days, spot) => {
        const s = snapshot(basis, { spotPrice: spot }, days);
        const monthly = engine.calculateMetrics(s).monthlyBasis;
        expect(engine.generateSignal(s).signal).toBe(classify(monthly));
      }),
      { numRuns: 500 },
    );
  });

  test('Property 3: Backwardation always stops out', () => {
    fc.assert(
      fc.property(fc.double({ min: -0.5, max: -0.0001, noNaN: true }), daysArb, (basis, days) => {
        const decision = engine.generateSignal(snapshot(basis, {}, days));
        expect(decision).toEqual({ signal: 'STOP_LOSS', reason: 'Backwardation detected - basis negative' });
      }),
    );
  });

  test('Property 4: An expired contract never signals entry', () => {
    fc.assert(
      fc.property(basisArb, fc.integer({ min: -30, max: 0 }), (basis, days) => {
        const s = snapshot(basis, {}, days);
        expect(engine.calculateMetrics(s).monthlyBasis).toBe(0);
        expect(engine.generateSignal(s).signal).toBe('STOP_LOSS');
      }),
    );
  });

  test('Property 5: An ETF discount beyond 1% stops out a healthy basis', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0.005, max: 0.03, noNaN: true }),
        fc.double({ min: 0.011, max: 0.2, noNaN: true }),
        (basis, discount) => {
          const s = snapshot(basis, { etfNav: 50, etfPrice: 50 * (1 - discount) });
          expect(engine.generateSignal(s).signal).toBe('STOP_LOSS');
        },
      ),
    );
  });
});

describe('determineAction Property Tests', () => {
  const signalArb = fc.constantFrom(...SIGNALS);

  test('Property 6: Never opens on top of an open position', () => {
    fc.assert(
      fc.property(signalArb, (signal) => {
        expect(['NONE', 'CLOSE', 'REDUCE']).toContain(determineAction(signal, true));
      }),
    );
  });

  test('Property 7: Never closes or reduces a flat position', () => {
    fc.assert(
      fc.property(signalArb, (signal) => {
        expect(['NONE', 'OPEN']).toContain(determineAction(signal, false));
      }),
    );
  });
});
