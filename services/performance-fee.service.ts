import { Bps, Identity, PerformanceFeeConfig } from '../types';
import { MAX_PERFORMANCE_FEE_BPS, NULL_IDENTITY } from '../config/strategy';
import { applyBps, ratioBps } from '../utils/bps';
import { StrategyError } from '../utils/strategy-error';
import { ConfigurationChange, EventOf } from './strategy-events';
import { StrategyState } from './strategy-state';
import { ITokenLedger } from './vault-adapter';

export interface FeeQuote {
  fee: bigint;
  /** Value per 10000 shares at the time of the quote; 0 when there are no shares. */
  supplyPerShare: bigint;
  referenceMark: bigint;
}

/**
 * High-water-mark performance fee. Marks are value per 10000 shares; a user
 * pays feeBps of the gain above their own mark (or the global one), and their
 * mark moves to the current value once charged.
 */
export class PerformanceFeeService {
  referenceMark(state: StrategyState, user: Identity): bigint {
    return state.userHighWaterMarks.get(user) ?? state.globalHighWaterMark;
  }

  /** Value per 10000 shares; null while there are no shares. */
  valuePerShare(token: ITokenLedger): bigint | null {
    const shares = token.totalShares();
    return shares === 0n ? null : ratioBps(token.totalSupply(), shares);
  }

  /**
   * One read of supply and shares; both the fee and the new mark come from it.
   */
  quote(state: StrategyState, token: ITokenLedger, user: Identity): FeeQuote {
    const referenceMark = this.referenceMark(state, user);
    const supplyPerShare = this.valuePerShare(token);
    if (supplyPerShare === null) return { fee: 0n, supplyPerShare: 0n, referenceMark };
    if (supplyPerShare <= referenceMark) return { fee: 0n, supplyPerShare, referenceMark };

    const excessReturn = applyBps(supplyPerShare - referenceMark, token.balanceOf(user));
    return { fee: applyBps(excessReturn, state.performanceFee.feeBps), supplyPerShare, referenceMark };
  }

  pendingFee(state: StrategyState, token: ITokenLedger, user: Identity): bigint {
    return this.quote(state, token, user).fee;
  }

  /**
   * Transfers the pending fee to the recipient, then moves the user's mark.
   * Returns null when nothing is owed.
   */
  chargeFee(state: StrategyState, token: ITokenLedger, user: Identity): EventOf<'PerformanceFeeCharged'> | null {
    const { fee, supplyPerShare, referenceMark } = this.quote(state, token, user);
    if (fee === 0n) return null;

    const recipient = state.performanceFee.recipient;
    if (!token.transferValue(user, recipient, fee)) {
      throw new StrategyError('TransferFailed', 'Performance fee transfer failed. Please try again.');
    }
    state.userHighWaterMarks.set(user, supplyPerShare);

    return {
      type: 'PerformanceFeeCharged',
      user,
      recipient,
      amount: fee,
      previousMark: referenceMark,
      newMark: supplyPerShare,
    };
  }

  validate(config: PerformanceFeeConfig): void {
    if (config.feeBps > MAX_PERFORMANCE_FEE_BPS) {
      throw new StrategyError('InvalidFeeRate', `Performance fee must be at most ${MAX_PERFORMANCE_FEE_BPS} bps`);
    }
    if (config.recipient.trim() === NULL_IDENTITY) {
      throw new StrategyError('InvalidRecipient', 'Fee recipient is required');
    }
  }

  setConfig(state: StrategyState, feeBps: Bps, recipient: Identity): ConfigurationChange {
    const after = { feeBps, recipient };
    this.validate(after);
    const before = { ...state.performanceFee };
    state.performanceFee = after;
    return { target: 'performanceFee', before, after: { ...after } };
  }

  /**
   * Raises the global mark to the current value per share. Never lowers it,
   * and does nothing while there are no shares. Returns the previous and new
   * mark only when the mark moved.
   */
  updateGlobalHighWaterMark(state: StrategyState, token: ITokenLedger): { previousMark: bigint; newMark: bigint } | null {
    const current = this.valuePerShare(token);
    if (current === null) return null;

    const previousMark = state.globalHighWaterMark;
    if (current <= previousMark) return null;

    state.globalHighWaterMark = current;
    return { previousMark, newMark: current };
  }
}

export const performanceFeeService = new PerformanceFeeService();
