/**
 * Node Registry - owns the canonical per-guild Node.
 *
 * Reads hand out independent snapshots; changes only land through insert()
 * or update(). Two callers doing read/mutate/insert on the same guild race
 * and the last insert wins. Use update() for a change that must not lose a
 * concurrent write.
 */
import type { Node, Snowflake } from '../../types/voice';
import { NodeData } from './nodeData';
import { DEFAULT_VOLUME, EQUALIZER_BAND_COUNT } from './constants';

export function cloneNode<TData>(node: Node<TData>): Node<TData> {
  return {
    ...node,
    queue: [...node.queue],
    equalizer: [...node.equalizer],
  };
}

export class NodeRegistry<TData> {
  private readonly nodes = new Map<Snowflake, Node<TData>>();

  constructor(private readonly createData: () => TData) {}

  /** Fresh node with default playback state and an empty data slot */
  create(guildId: Snowflake): Node<TData> {
    return {
      guildId,
      volume: DEFAULT_VOLUME,
      isPaused: false,
      isOnLoops: false,
      nowPlaying: null,
      queue: [],
      equalizer: new Array<number>(EQUALIZER_BAND_COUNT).fill(0),
      data: new NodeData(this.createData),
    };
  }

  get(guildId: Snowflake): Node<TData> | undefined {
    const node = this.nodes.get(guildId);
    return node ? cloneNode(node) : undefined;
  }

  has(guildId: Snowflake): boolean {
    return this.nodes.has(guildId);
  }

  insert(guildId: Snowflake, node: Node<TData>): void {
    this.nodes.set(guildId, cloneNode({ ...node, guildId }));
  }

  /** Insert a default node unless one exists; returns whether it did */
  ensure(guildId: Snowflake): boolean {
    if (this.nodes.has(guildId)) return false;
    this.nodes.set(guildId, this.create(guildId));
    return true;
  }

  /**
   * Read, mutate and write back in one step. Returns the stored snapshot, or
   * undefined when the guild has no node.
   */
  update(guildId: Snowflake, mutator: (node: Node<TData>) => void): Node<TData> | undefined {
    const node = this.get(guildId);
    if (!node) return undefined;
    mutator(node);
    this.insert(guildId, node);
    return cloneNode(node);
  }

  remove(guildId: Snowflake): boolean {
    return this.nodes.delete(guildId);
  }

  guildIds(): Snowflake[] {
    return [...this.nodes.keys()];
  }

  get size(): number {
    return this.nodes.size;
  }
}
