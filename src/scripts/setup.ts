import * as dotenv from "dotenv";
import { Database, createDatabase } from "../db";

dotenv.config();

// データベース接続を待つ関数
async function waitForDatabase(
  db: Database,
  maxAttempts = 10,
  delayMs = 2000
): Promise<boolean> {
  console.log("Waiting for database to be ready...");

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    console.log(`Connection attempt ${attempt}/${maxAttempts}...`);

    const isConnected = await db.testConnection();
    if (isConnected) {
      console.log("Database is ready!");
      return true;
    }

    if (attempt < maxAttempts) {
      console.log(`Waiting ${delayMs}ms before retry...`);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  return false;
}

async function setup() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    console.error("DATABASE_URL is not set");
    process.exit(1);
  }

  const db = createDatabase({ connectionString });

  try {
    const isReady = await waitForDatabase(db);
    if (!isReady) {
      throw new Error("Could not connect to database after multiple attempts");
    }

    console.log("\nSetting up database schema...");
    await db.ensureSchema();
    console.log("✓ Schema created successfully");

    const countResult = await db.query(`
      SELECT
        (SELECT COUNT(*) FROM users) as users,
        (SELECT COUNT(*) FROM blog_posts) as posts,
        (SELECT COUNT(*) FROM comments) as comments
    `);

    console.log("\n📊 Data summary:");
    console.table(countResult.rows[0]);

    console.log("\n✅ Database setup completed successfully!");
    await db.end();
    process.exit(0);
  } catch (error) {
    console.error("\n❌ Error setting up database:", error);
    await db.end();
    process.exit(1);
  }
}

setup().catch((error) => {
  console.error("Error:", error);
  process.exit(1);
});
