import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import type { IConfig } from "../../../shared/config/IConfig";
import type { ILogger } from "../../logging/ILogger";
import { IStudyRepository } from "../../../domain/studies/repositories/IStudyRepository";
import {
  StudyArtifact,
  StudyDraft,
  StudyMetadata,
  studyMetadataSchema,
} from "../../../domain/studies/entities/StudyArtifact";
import { slugCandidate } from "../../../domain/studies/value-objects/Slug";
import {
  formatDocument,
  parseDocument,
} from "../../../domain/studies/services/StudyDocument";
import {
  ArtifactNotFoundError,
  PersistenceError,
} from "../../../shared/errors/PipelineErrors";
import { ValidationError } from "../../../shared/errors/InputErrors";
import { errorMessage } from "../../../shared/errors/errorMessage";
import { newestFirst, sameReference } from "../studyOrdering";

const METADATA_DIR = ".metadata";
const MAX_ATTEMPTS = 1000;

function hasCode(error: unknown, code: string): boolean {
  return (
    error instanceof Error && "code" in error && error.code === code
  );
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (error) {
    if (hasCode(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}

/** Create `file` with `content`; rejects with EEXIST if it is already there */
async function writeExclusive(file: string, content: string): Promise<void> {
  const handle = await fs.open(file, "wx");
  let written = false;
  try {
    await handle.writeFile(content, "utf-8");
    await handle.sync();
    written = true;
  } finally {
    await handle.close();
    if (!written) {
      await fs.rm(file, { force: true });
    }
  }
}

/**
 * Filesystem implementation of IStudyRepository
 *
 *   <output>/<slug>.md              the study document
 *   <output>/.metadata/<slug>.json  its metadata record
 *
 * The document is staged in a temp file, the slug is claimed by creating
 * the metadata record exclusively, and the document is then hard-linked
 * into place. A reader never sees a half-written document, and concurrent
 * writers never share a slug.
 */
@injectable()
export class FileStudyRepository implements IStudyRepository {
  private readonly root: string;
  private readonly metadataDir: string;
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Config) config: IConfig,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.root = config.outputDirectory;
    this.metadataDir = path.join(this.root, METADATA_DIR);
    this.logger = logger.child({ component: "FileStudyRepository" });
  }

  async create(draft: StudyDraft): Promise<StudyArtifact> {
    const document = formatDocument(draft.frontmatter, draft.title, draft.body);

    try {
      await fs.mkdir(this.metadataDir, { recursive: true });
    } catch (error) {
      throw new PersistenceError(
        `Cannot create output directory ${this.root}: ${errorMessage(error)}`,
        error,
      );
    }

    const tempPath = path.join(this.root, `.${draft.baseSlug}.${randomUUID()}.tmp`);

    try {
      await writeExclusive(tempPath, document);

      for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
        const slug = slugCandidate(draft.baseSlug, attempt);
        const bodyPath = this.bodyPath(slug);
        const metadataPath = this.metadataPath(slug);

        if (await exists(bodyPath)) {
          continue;
        }

        const metadata: StudyMetadata = {
          ...draft.metadata,
          slug,
          file_path: bodyPath,
        };

        if (!(await this.claim(metadataPath, metadata))) {
          continue;
        }

        try {
          await fs.link(tempPath, bodyPath);
        } catch (error) {
          await fs.rm(metadataPath, { force: true });
          if (hasCode(error, "EEXIST")) {
            continue;
          }
          throw error;
        }

        this.logger.debug("Study written", { slug, attempt });

        return {
          slug,
          filePath: bodyPath,
          metadata,
          frontmatter: draft.frontmatter,
          title: draft.title,
          body: draft.body.trim(),
          document,
        };
      }

      throw new PersistenceError(
        `No free slug for ${draft.baseSlug} after ${MAX_ATTEMPTS} attempts`,
      );
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError(
        `Failed to save study ${draft.baseSlug}: ${errorMessage(error)}`,
        error,
      );
    } finally {
      await fs.rm(tempPath, { force: true }).catch((error: unknown) =>
        this.logger.warn("Could not remove temp file", {
          tempPath,
          error: errorMessage(error),
        }),
      );
    }
  }

  async list(): Promise<StudyMetadata[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.metadataDir);
    } catch (error) {
      if (hasCode(error, "ENOENT")) {
        return [];
      }
      throw new PersistenceError(
        `Cannot read ${this.metadataDir}: ${errorMessage(error)}`,
        error,
      );
    }

    const records: StudyMetadata[] = [];

    for (const entry of entries.filter((name) => name.endsWith(".json"))) {
      const record = await this.readMetadata(path.join(this.metadataDir, entry));
      if (!record) {
        continue;
      }
      if (!(await exists(this.bodyPath(record.slug)))) {
        this.logger.debug("Skipping metadata without a document", {
          slug: record.slug,
        });
        continue;
      }
      records.push(record);
    }

    return records.sort(newestFirst);
  }

  async get(slugOrPath: string): Promise<StudyArtifact> {
    const byPath = slugOrPath.endsWith(".md");
    if (!byPath && /[\\/]/.test(slugOrPath)) {
      throw new ValidationError(
        `Invalid study slug "${slugOrPath}": a slug has no path separators`,
        "slug",
      );
    }
    const filePath = byPath ? slugOrPath : this.bodyPath(slugOrPath);
    const slug = path.basename(filePath, ".md");

    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (hasCode(error, "ENOENT") || hasCode(error, "EISDIR")) {
        throw new ArtifactNotFoundError(slugOrPath);
      }
      throw new PersistenceError(
        `Cannot read ${filePath}: ${errorMessage(error)}`,
        error,
      );
    }

    const parsed = parseDocument(content);
    if (!parsed) {
      throw new PersistenceError(`${filePath} is not a study document`);
    }

    const stored = await this.readMetadata(this.metadataPath(slug));
    const metadata: StudyMetadata = stored ?? {
      engine: parsed.frontmatter.engine,
      reference: parsed.frontmatter.reference,
      date: parsed.frontmatter.date,
      word_count: parsed.frontmatter.word_count,
      slug,
      file_path: filePath,
      created_at: (await fs.stat(filePath)).mtime.toISOString(),
      length_out_of_range: false,
    };

    return {
      slug,
      filePath,
      metadata,
      frontmatter: parsed.frontmatter,
      title: parsed.title,
      body: parsed.body,
      document: content,
    };
  }

  async findByReference(citation: string): Promise<StudyMetadata[]> {
    return (await this.list()).filter((m) => sameReference(m.reference, citation));
  }

  private bodyPath(slug: string): string {
    return path.join(this.root, `${slug}.md`);
  }

  private metadataPath(slug: string): string {
    return path.join(this.metadataDir, `${slug}.json`);
  }

  /** Exclusive create of the metadata record; false if the slug is taken */
  private async claim(metadataPath: string, metadata: StudyMetadata): Promise<boolean> {
    try {
      await writeExclusive(metadataPath, `${JSON.stringify(metadata, null, 2)}\n`);
      return true;
    } catch (error) {
      if (hasCode(error, "EEXIST")) {
        return false;
      }
      throw error;
    }
  }

  private async readMetadata(file: string): Promise<StudyMetadata | null> {
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (hasCode(error, "ENOENT")) {
        return null;
      }
      throw new PersistenceError(`Cannot read ${file}: ${errorMessage(error)}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("Skipping unreadable metadata record", {
        file,
        error: errorMessage(error),
      });
      return null;
    }

    const result = studyMetadataSchema.safeParse(json);
    if (!result.success) {
      this.logger.warn("Skipping invalid metadata record", {
        file,
        issues: result.error.issues.map((issue) => issue.message),
      });
      return null;
    }
    return result.data;
  }
}
