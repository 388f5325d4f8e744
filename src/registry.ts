import { TypeNotRegisteredError } from "./errors";
import type { TypeDescriptor } from "./types";

/**
 * Any class whose instances can be looked up by constructor.
 */
export type Constructor = abstract new (...args: never[]) => object;

/**
 * Registration information for a type.
 */
interface TypeRegistration {
  name: string;
  type: TypeDescriptor;
  ctor?: Constructor;
}

/**
 * Registry maps type names and class constructors to descriptors, so values
 * can be encoded and decoded without passing a descriptor each time.
 */
export class Registry {
  private byName: Map<string, TypeRegistration> = new Map();
  private byConstructor: Map<unknown, TypeRegistration> = new Map();

  /**
   * Registers a descriptor under a name and, optionally, a class whose
   * instances it describes.
   */
  register(name: string, type: TypeDescriptor, ctor?: Constructor): void {
    const registration: TypeRegistration = { name, type, ctor };

    this.byName.set(name, registration);
    if (ctor !== undefined) {
      this.byConstructor.set(ctor, registration);
    }
  }

  /**
   * Gets the descriptor registered under a name.
   */
  getType(name: string): TypeDescriptor {
    const reg = this.byName.get(name);
    if (!reg) {
      throw new TypeNotRegisteredError(name);
    }
    return reg.type;
  }

  /**
   * Finds the descriptor for a value by walking its prototype chain.
   * Returns undefined if no class on the chain is registered.
   */
  lookup(value: unknown): TypeDescriptor | undefined {
    if (typeof value !== "object" || value === null) {
      return undefined;
    }
    let proto: object | null = Object.getPrototypeOf(value);
    while (proto !== null) {
      const ctor: unknown = Reflect.get(proto, "constructor");
      const reg = this.byConstructor.get(ctor);
      if (reg) {
        return reg.type;
      }
      proto = Object.getPrototypeOf(proto);
    }
    return undefined;
  }

  /**
   * Checks if a type name is registered.
   */
  isRegistered(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Clears all registrations.
   */
  clear(): void {
    this.byName.clear();
    this.byConstructor.clear();
  }
}

/**
 * Global default registry instance.
 */
export const defaultRegistry = new Registry();

/**
 * Registers a type with the default registry.
 */
export function register(name: string, type: TypeDescriptor, ctor?: Constructor): void {
  defaultRegistry.register(name, type, ctor);
}
