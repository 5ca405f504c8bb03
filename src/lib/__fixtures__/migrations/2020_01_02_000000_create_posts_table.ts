import { Migration } from "../../migration";

export default class extends Migration {
  async up(): Promise<void> {
    await this.schema.createTable("posts", {
      id: "SERIAL PRIMARY KEY",
      title: "TEXT NOT NULL",
    });
  }

  async down(): Promise<void> {
    await this.schema.dropTable("posts");
  }
}
