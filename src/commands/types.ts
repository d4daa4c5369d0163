/**
 * Types and interfaces for service commands
 * @module
 */

/**
 * Context object passed to command actions.
 */
export interface CommandContext {
	/** Writes one line of command output */
	write: (content: string) => void;
}

/**
 * Definition for a command parameter/option.
 */
export interface ParameterDefinition {
	name: string; // e.g., "count", "executable"
	description: string;
	type: 'string' | 'boolean' | 'number';
	required?: boolean;
	alias?: string; // e.g., "n" for "--count"
	isFlag?: boolean; // True if it's a boolean flag like --verbose
}

/**
 * Command execution result
 */
export interface CommandResult {
	success: boolean;
	error?: Error;
}
