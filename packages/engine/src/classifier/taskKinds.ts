/**
 * @fileoverview Task kind definitions
 *
 * Descriptions of each task kind shown to the oracle when it classifies
 * a request. Normally loaded from configuration.
 *
 * @module @mockpilot/engine/classifier/taskKinds
 */

import type { TaskKind } from "../contracts/TaskKind.js";
import { TASK_KINDS } from "../contracts/TaskKind.js";

export interface TaskKindDefinition {
    readonly id: TaskKind;

    /** Heading the kind is listed under */
    readonly group?: string;

    readonly description: string;
    readonly examples?: readonly string[];
}

/**
 * Bare definitions derived from the kind names, used when no
 * configuration is available.
 */
export function defaultTaskKindDefinitions(): TaskKindDefinition[] {
    return TASK_KINDS.map(id => ({
        id,
        description: id.toLowerCase().replace(/_/g, " "),
    }));
}

function describe(definition: TaskKindDefinition): string {
    const examples = definition.examples?.length
        ? `\n    Examples: ${definition.examples.map(e => `"${e}"`).join(", ")}`
        : "";
    return `- ${definition.id}: ${definition.description}${examples}`;
}

/**
 * Render definitions as a list, grouped under their headings in order of
 * first appearance.
 */
export function buildCategoryList(definitions: readonly TaskKindDefinition[]): string {
    const groups = new Map<string, TaskKindDefinition[]>();
    for (const definition of definitions) {
        const group = definition.group ?? "";
        const members = groups.get(group) ?? [];
        members.push(definition);
        groups.set(group, members);
    }

    const sections: string[] = [];
    for (const [group, members] of groups) {
        const lines = members.map(describe).join("\n");
        sections.push(group ? `**${group}:**\n${lines}` : lines);
    }
    return sections.join("\n\n");
}
