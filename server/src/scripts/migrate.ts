import env from "../utils/env-vars";
import { logger } from "../utils/logger";
import { migrate, openDatabase } from "../db/database";

const db = openDatabase(env.DATABASE_FILE);
try {
  const applied = migrate(db);
  logger.info(
    applied.length
      ? `Applied ${applied.length} migration(s) to ${env.DATABASE_FILE}`
      : `${env.DATABASE_FILE} is up to date`
  );
} finally {
  db.close();
}
