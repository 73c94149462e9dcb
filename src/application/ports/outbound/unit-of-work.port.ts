/**
 * Outbound port for transactional work.
 *
 * Every repository call made inside `work` joins the same transaction.
 * The transaction commits when `work` resolves and rolls back when it
 * rejects; the rejection is rethrown.
 */
export interface IUnitOfWorkPort {
  execute<T>(work: () => Promise<T>): Promise<T>;
}
