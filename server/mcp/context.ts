import type { IndexSummary } from "../slideLibrary/types";
import { SlideLibraryManager, type SlideLibraryOptions } from "../slideLibrary/libraryManager";
import { ProposalDeckBuilder } from "../deckBuilder/proposalDeckBuilder";
import type { RuntimeConfig } from "../config/runtime";
import { NotIndexedError, ValidationError } from "../utils/errorHandler";
import { createLogger } from "../utils/logger";
import type { MCPContext } from "./types";

const log = createLogger("MCPContext");

/**
 * Holds the slide library the tool layer works against. Indexing a new path
 * replaces the manager; reads go to whichever manager was indexed last.
 */
export class SlideLibrarySession {
  private manager: SlideLibraryManager | null = null;

  constructor(
    private readonly defaultPath?: string,
    private readonly options: SlideLibraryOptions = {},
  ) {}

  get libraryPath(): string | null {
    return this.manager?.libraryPath ?? null;
  }

  async index(libraryPath?: string): Promise<IndexSummary> {
    const manager = libraryPath
      ? new SlideLibraryManager(libraryPath, this.options)
      : this.manager ?? this.managerForDefaultPath();
    const summary = await manager.index();

    if (manager !== this.manager) {
      log.info(`Slide library set to ${manager.libraryPath}`);
    }
    this.manager = manager;
    return summary;
  }

  private managerForDefaultPath(): SlideLibraryManager {
    if (!this.defaultPath) {
      throw new ValidationError("libraryPath is required: no slide library has been configured");
    }
    return new SlideLibraryManager(this.defaultPath, this.options);
  }

  /**
   * The indexed manager; NotIndexed until index() has succeeded once.
   */
  get(): SlideLibraryManager {
    if (!this.manager) {
      throw new NotIndexedError();
    }
    return this.manager;
  }
}

export function makeMCPContext(config: RuntimeConfig, options: SlideLibraryOptions = {}): MCPContext {
  return {
    library: new SlideLibrarySession(config.slideLibraryPath, options),
    decks: new ProposalDeckBuilder(),
    config,
  };
}
