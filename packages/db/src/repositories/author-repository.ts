import { eq } from "drizzle-orm";
import type { Author, RequestContext } from "@clean-articles/types";
import type { IAuthorRepository } from "@clean-articles/core";
import { NotFound } from "@clean-articles/errors";
import type { DbClient } from "../client.js";
import { authors } from "../schema/authors.js";

export class PgAuthorRepository implements IAuthorRepository {
  constructor(private readonly db: DbClient) {}

  async getById(_ctx: RequestContext, id: number): Promise<Author> {
    const [row] = await this.db.select().from(authors).where(eq(authors.id, id)).limit(1);
    if (!row) {
      throw NotFound;
    }
    return row;
  }
}
