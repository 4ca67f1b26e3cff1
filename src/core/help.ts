/**
 * Core helpfile module.
 *
 * Provides interfaces for helpfile data structures.
 *
 * @module core/help
 */

/**
 * Represents a single helpfile entry.
 */
export interface Helpfile {
	/** Primary keyword for this helpfile */
	keyword: string;
	/** Alternative keywords that reference this helpfile */
	aliases: string[];
	/** Keywords of related helpfiles */
	related: string[];
	/** The help content (supports multiline text) */
	content: string;
}
