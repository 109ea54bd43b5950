// ============================================
// MELIAPP - Drizzle Instance
// ============================================

import { getDrizzleDb, closeDatabaseConnection } from '../config/database.js';
import type { DrizzleDb } from '../config/database.js';

export { getDrizzleDb, closeDatabaseConnection };
export type { DrizzleDb };
