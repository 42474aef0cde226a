import { NodeName, PAYLOAD_OWNERS, PayloadField } from '../state/pipeline-state';
import { PipelineNode } from './node';

/** The set of nodes making up a pipeline, keyed by unique name. */
export class NodeRegistry {
    private nodes = new Map<NodeName, PipelineNode>();
    private static readonly NAME_PATTERN = /^[a-z0-9_]+$/;

    register(node: PipelineNode): PipelineNode {
        if (!NodeRegistry.NAME_PATTERN.test(node.name)) {
            throw new Error('Node name must contain only lowercase alphanumeric characters and underscores');
        }
        if (this.nodes.has(node.name)) {
            throw new Error(`Node "${node.name}" is already registered.`);
        }
        const foreign = node.writes.filter((field: PayloadField) => PAYLOAD_OWNERS[field] !== node.name);
        if (foreign.length > 0) {
            throw new Error(`Node "${node.name}" declares writes it does not own: ${foreign.join(', ')}`);
        }
        this.nodes.set(node.name, node);
        return node;
    }

    get(name: NodeName): PipelineNode {
        const node = this.nodes.get(name);
        if (!node) throw new Error(`Node "${name}" is not registered.`);
        return node;
    }

    has(name: NodeName): boolean {
        return this.nodes.has(name);
    }
}
