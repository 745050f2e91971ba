export interface Author {
  id: number;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Article {
  id: number;
  title: string;
  content: string;
  author: Author;
  createdAt: Date;
  updatedAt: Date;
}

/** Wire shape of an article as the API returns it. */
export interface ArticleJson {
  id: number;
  title: string;
  content: string;
  author: AuthorJson;
  updated_at: string;
  created_at: string;
}

export interface AuthorJson {
  id: number;
  name: string;
  created_at: string;
  updated_at: string;
}

export interface ArticlePage {
  articles: Article[];
  nextCursor: string;
}
