import test from "node:test";
import assert from "node:assert/strict";
import { readSchemaSql } from "./schema";

test("schema file only uses idempotent DDL", async () => {
  const sql = await readSchemaSql();
  const statements = sql
    .split(";")
    .map((statement) => statement.replace(/--.*$/gm, "").trim())
    .filter(Boolean);

  assert.equal(statements.length, 8);
  for (const statement of statements) {
    assert.match(statement, /^CREATE (TABLE|INDEX) IF NOT EXISTS /);
  }
});
