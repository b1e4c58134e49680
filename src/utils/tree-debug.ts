import type { SearchNode } from '../search-node.js';
import { formatState } from '../model/state.js';
import { calculateAvgReward } from './search-node-utils.js';
import { describeEffect } from './describe.js';

export const printTree = (node: SearchNode, depth: number = 0, prefix: string = ''): void => {
    const indent = '  '.repeat(depth);
    const average = node.visits > 0 ? node.utility / node.visits : 0;
    const label = node.action ? `${node.action.name} -> ` : 'ROOT ';
    console.log(`${indent}${prefix}${label}${formatState(node.state)}: visits=${node.visits}, avg=${average.toFixed(4)}, children=${node.childCount}${node.isGoal ? ' (goal)' : ''}`);

    let index = 0;
    for (const { child } of node.childEntries()) {
        printTree(child, depth + 1, `[${index}] `);
        index++;
    }
};

/**
 * Build the path from root to a given node, returning a readable string.
 * @param node - The node to trace back to root
 * @returns String like "traffic → gamble → raid"
 */
export const getNodePath = (node: SearchNode): string => {
    const names: string[] = [];
    let current: SearchNode | null = node;

    while (current !== null && current.action !== null) {
        names.unshift(current.action.name);
        current = current.parent;
    }

    return names.join(' → ');
};

const quote = (text: string): string => `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;

/**
 * Render the tree below `root` as a Graphviz DOT graph.
 *
 * Decision (state) nodes are ellipses labelled with their atoms, utility and visits;
 * action nodes are boxes. Only actions actually tried at a node are drawn, so
 * the nodes rollouts passed through stay out of the picture. Edges from a state
 * to an action carry the action's `reward,visits`; dashed edges from an action to a
 * state carry the effect that occurred.
 */
export function toGraphviz(root: SearchNode, graphName: string = 'search'): string {
    const lines: string[] = [];

    const visit = (node: SearchNode, name: string): void => {
        const decision = `decision_node${name}`;
        lines.push(`${quote(decision)} [label=${quote(`${[ ...node.state ].sort().join(', ')}\n${node.utility.toFixed(2)},${node.visits}`)}]`);

        let nextId = 0;
        for (const { action, effect, child } of node.childEntries()) {
            if (!node.triedActions.has(action)) {
                continue;
            }
            const actionNode = `action_node${name}_${action.name}`;
            const childName = `${name}_${nextId}`;
            lines.push(`${quote(actionNode)} [label=${quote(action.name)}, shape=box]`);
            visit(child, childName);
            lines.push(`${quote(actionNode)} -- ${quote(`decision_node${childName}`)} [style=dashed, label=${quote(describeEffect(effect))}]`);
            nextId++;
        }

        for (const [ action, stats ] of node.triedActions) {
            lines.push(`${quote(decision)} -- ${quote(`action_node${name}_${action.name}`)} [label=${quote(`${stats.reward.toFixed(2)},${stats.visits}`)}, penwidth=${quote(String(stats.visits ** 0.25))}]`);
        }
    };

    visit(root, '0');

    return [ `graph ${quote(graphName)} {`, ...lines.map(line => `  ${line}`), '}' ].join('\n') + '\n';
}

/**
 * One line per tried root action, best average first.
 */
export function formatRootScores(root: SearchNode): string[] {
    return [ ...root.triedActions ]
        .map(([ action, stats ]) => ({ name: action.name, average: calculateAvgReward(stats), visits: stats.visits }))
        .sort((a, b) => b.average - a.average)
        .map((entry, i) => `  ${i + 1}. ${entry.name} | score=${entry.average.toFixed(4)} | visits=${entry.visits}`);
}
