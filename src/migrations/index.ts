import { CreateLedgerTables1700000000000 } from './1700000000000-CreateLedgerTables';

export const migrations = [CreateLedgerTables1700000000000];
