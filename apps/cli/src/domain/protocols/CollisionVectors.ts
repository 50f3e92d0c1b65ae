import fs from "fs";
import path from "path";
import { z } from "zod";
import { DEFAULT_PROTOCOLS_DIR } from "./ProtocolRegistry";
import { ValidationError } from "../../shared/errors/InputErrors";

export const COLLISION_CATEGORIES = [
  "scientific",
  "cultural",
  "philosophical",
  "technological",
  "personal",
] as const;

export type CollisionCategory = (typeof COLLISION_CATEGORIES)[number];

/** One vector per category, as handed to the renderer */
export type CollisionVectors = Readonly<Record<CollisionCategory, string>>;

const catalogSchema = z.object({
  scientific: z.array(z.string().min(1)).min(1),
  cultural: z.array(z.string().min(1)).min(1),
  philosophical: z.array(z.string().min(1)).min(1),
  technological: z.array(z.string().min(1)).min(1),
  personal: z.array(z.string().min(1)).min(1),
});

export type CollisionCatalog = z.infer<typeof catalogSchema>;

export function isCollisionCategory(value: string): value is CollisionCategory {
  return COLLISION_CATEGORIES.some((category) => category === value);
}

/**
 * Collision vector catalog and randomizer
 *
 * Draws one vector per category. A caller-supplied vector replaces the
 * random draw in whichever category lists it.
 */
export class CollisionVectorCatalog {
  constructor(
    private readonly catalog: CollisionCatalog,
    private readonly random: () => number = Math.random,
  ) {}

  static load(
    file: string = path.join(DEFAULT_PROTOCOLS_DIR, "collision-vectors.json"),
    random?: () => number,
  ): CollisionVectorCatalog {
    const raw: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    return new CollisionVectorCatalog(catalogSchema.parse(raw), random);
  }

  list(category?: CollisionCategory): Partial<CollisionCatalog> {
    if (category) {
      const single: Partial<CollisionCatalog> = {};
      single[category] = [...this.catalog[category]];
      return single;
    }
    return { ...this.catalog };
  }

  pick(customVector?: string): CollisionVectors {
    const wanted = customVector?.trim().toLowerCase();

    if (wanted && !this.categoryOf(wanted)) {
      throw new ValidationError(
        `Unknown collision vector "${customVector}". Run "lectionary vectors" to see the options.`,
        "vector",
      );
    }

    const draw = (category: CollisionCategory): string => {
      const options = this.catalog[category];
      const custom = options.find((option) => option.toLowerCase() === wanted);
      if (custom) {
        return custom;
      }
      const index = Math.min(
        Math.floor(this.random() * options.length),
        options.length - 1,
      );
      return options[index];
    };

    return {
      scientific: draw("scientific"),
      cultural: draw("cultural"),
      philosophical: draw("philosophical"),
      technological: draw("technological"),
      personal: draw("personal"),
    };
  }

  private categoryOf(lowercased: string): CollisionCategory | undefined {
    return COLLISION_CATEGORIES.find((category) =>
      this.catalog[category].some(
        (option) => option.toLowerCase() === lowercased,
      ),
    );
  }
}
