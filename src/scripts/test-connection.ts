import * as dotenv from "dotenv";
import { createDatabase } from "../db";

dotenv.config();

async function main() {
  const connectionString = process.env.DATABASE_URL;
  console.log("Testing database connection...");

  if (!connectionString) {
    console.log("❌ DATABASE_URL is not set");
    process.exit(1);
  }

  const db = createDatabase({ connectionString });
  const isConnected = await db.testConnection();
  await db.end();

  if (isConnected) {
    console.log("✅ Connection successful!");
    process.exit(0);
  } else {
    console.log("❌ Connection failed!");
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("Error:", error);
  process.exit(1);
});
