export interface LedgerConfig {
  /** How long a transition waits for a row lock before giving up */
  lockTimeoutMs: number;
}

export const getLedgerConfig = (): LedgerConfig => {
  const parsed = parseInt(process.env.LEDGER_LOCK_TIMEOUT_MS || "", 10);
  return {
    lockTimeoutMs: Number.isFinite(parsed) && parsed > 0 ? parsed : 5000,
  };
};
