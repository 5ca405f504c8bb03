import { Migration } from "../../migration";

export class CreateUsersTable extends Migration {
  async up(): Promise<void> {
    await this.schema.createTable("users", {
      id: "SERIAL PRIMARY KEY",
      email: "TEXT NOT NULL",
    });
  }

  async down(): Promise<void> {
    await this.schema.dropTable("users");
  }
}
