import { readFileSync } from "fs";
import { join } from "path";
import yaml from "js-yaml";
import { z } from "zod";

export interface CuratedShelfItem {
  title: string;
  author: string;
  genre: string;
}

export interface CuratedShelf {
  name: string;
  items: CuratedShelfItem[];
}

export interface DemoBook {
  title: string;
  author: string;
  genre: string;
  rating: number;
  cover: string;
}

export interface CatalogConfig {
  genres: string[];
  demoBooks: DemoBook[];
  curatedShelves: CuratedShelf[];
}

const shelfItemSchema = z
  .tuple([z.string(), z.string(), z.string()])
  .transform(([title, author, genre]) => ({ title, author, genre }));

const catalogSchema = z.object({
  genres: z.array(z.string()),
  demo_books: z.array(
    z.object({
      title: z.string(),
      author: z.string(),
      genre: z.string().default("Other"),
      rating: z.number().default(0),
      cover: z.string().default(""),
    })
  ),
  curated_shelves: z.array(
    z.object({
      name: z.string(),
      items: z.array(shelfItemSchema),
    })
  ),
});

let catalogCache: CatalogConfig | null = null;

/**
 * Parse and validate catalog YAML; throws a ZodError on a malformed entry
 */
export function parseCatalogConfig(content: string): CatalogConfig {
  const data = catalogSchema.parse(yaml.load(content));
  return {
    genres: data.genres,
    demoBooks: data.demo_books,
    curatedShelves: data.curated_shelves,
  };
}

/**
 * Load genres, demo books and curated shelves from YAML
 */
export function loadCatalogConfig(): CatalogConfig {
  if (catalogCache) return catalogCache;

  const filePath = join(process.cwd(), "lib/config/catalog.yaml");
  catalogCache = parseCatalogConfig(readFileSync(filePath, "utf-8"));
  return catalogCache;
}

export function getGenres(): string[] {
  return loadCatalogConfig().genres;
}

export function getDemoBooks(): DemoBook[] {
  return loadCatalogConfig().demoBooks;
}

export function getCuratedShelves(): CuratedShelf[] {
  return loadCatalogConfig().curatedShelves;
}
