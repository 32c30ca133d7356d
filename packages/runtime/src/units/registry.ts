// Unit registry - maps names to units and URIs to resources

import type { Command, Query, Resource, ResourceFactory, Unit } from '@asms/protocol';
import { UnitError, isStreamingCommand } from '@asms/protocol';

function alreadyRegistered(kind: string, key: string): UnitError {
  return new UnitError('already_exists', `${kind} already registered: ${key}`, {
    details: { [kind]: key },
  });
}

/**
 * Discovery record for a unit.
 */
export type UnitDescriptor = {
  name: string;
  domain: string;
  kind: Unit['kind'];
  description: string;
  inputSchema: Unit['inputSchema'];
  outputSchema: Unit['outputSchema'];
  examples: Unit['examples'];
  streaming: boolean;
};

export function describeUnit(unit: Unit): UnitDescriptor {
  return {
    name: unit.name,
    domain: unit.domain,
    kind: unit.kind,
    description: unit.description,
    inputSchema: unit.inputSchema,
    outputSchema: unit.outputSchema,
    examples: unit.examples,
    streaming: isStreamingCommand(unit),
  };
}

/**
 * Registry for commands, queries, static resources and resource factories.
 *
 * Names and URIs are unique; registering a duplicate fails `already_exists`.
 * Listing preserves registration order.
 */
export class UnitRegistry {
  private commands = new Map<string, Command>();
  private queries = new Map<string, Query>();
  private resources = new Map<string, Resource>();
  private factories: ResourceFactory[] = [];

  registerCommand(command: Command): void {
    if (this.commands.has(command.name)) {
      throw alreadyRegistered('command', command.name);
    }
    this.commands.set(command.name, command);
  }

  registerQuery(query: Query): void {
    if (this.queries.has(query.name)) {
      throw alreadyRegistered('query', query.name);
    }
    this.queries.set(query.name, query);
  }

  registerResource(resource: Resource): void {
    if (this.resources.has(resource.uri)) {
      throw alreadyRegistered('resource', resource.uri);
    }
    this.resources.set(resource.uri, resource);
  }

  registerResourceFactory(factory: ResourceFactory): void {
    if (this.factories.some((existing) => existing.pattern === factory.pattern)) {
      throw alreadyRegistered('factory', factory.pattern);
    }
    this.factories.push(factory);
  }

  unregisterCommand(name: string): boolean {
    return this.commands.delete(name);
  }

  unregisterQuery(name: string): boolean {
    return this.queries.delete(name);
  }

  unregisterResource(uri: string): boolean {
    return this.resources.delete(uri);
  }

  getCommand(name: string): Command | undefined {
    return this.commands.get(name);
  }

  getQuery(name: string): Query | undefined {
    return this.queries.get(name);
  }

  /**
   * A command or query by name, commands first.
   */
  getUnit(name: string): Unit | undefined {
    return this.commands.get(name) ?? this.queries.get(name);
  }

  /**
   * Static resources first, then the first factory that accepts the URI.
   */
  getResource(uri: string): Resource | undefined {
    const resource = this.resources.get(uri);
    if (resource) return resource;
    const factory = this.factories.find((candidate) => candidate.canCreate(uri));
    return factory?.create(uri);
  }

  listCommands(): Command[] {
    return Array.from(this.commands.values());
  }

  listQueries(): Query[] {
    return Array.from(this.queries.values());
  }

  listResources(): Resource[] {
    return Array.from(this.resources.values());
  }

  listResourceFactories(): ResourceFactory[] {
    return [...this.factories];
  }

  listUnits(): Unit[] {
    return [...this.listCommands(), ...this.listQueries()];
  }

  counts(): { commands: number; queries: number; resources: number; factories: number } {
    return {
      commands: this.commands.size,
      queries: this.queries.size,
      resources: this.resources.size,
      factories: this.factories.length,
    };
  }

  /**
   * Remove everything. Primarily for testing.
   */
  clear(): void {
    this.commands.clear();
    this.queries.clear();
    this.resources.clear();
    this.factories = [];
  }
}
