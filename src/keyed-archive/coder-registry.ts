import { assert } from '../assert';
import { builtinCoders } from './builtin-coders';
import type { CoderType } from './keyed-unarchiver';

/**
 * Maps exact, case-sensitive `$classname`s to the coder that decodes them.
 * Registering a second, different coder for a name that is already taken throws.
 */
export class CoderRegistry {
  private readonly _classNameCoders = new Map<string, CoderType>();

  static withBuiltins() {
    const registry = new CoderRegistry();
    for (const coder of builtinCoders) {
      registry.register(coder);
    }
    return registry;
  }

  get classNames(): readonly string[] {
    return [...this._classNameCoders.keys()];
  }

  register(coderClass: CoderType) {
    for (const className of coderClass.$classnames) {
      this.setClass(coderClass, className);
    }
    return this;
  }

  setClass(coderClass: CoderType, forClassName: string) {
    assert(() => forClassName.length > 0, 'Coder class name must not be empty');

    const existing = this._classNameCoders.get(forClassName);
    assert(
      () => existing === undefined || existing === coderClass,
      `Coder for class name ${forClassName} already exists`,
    );
    this._classNameCoders.set(forClassName, coderClass);
    return this;
  }

  getClass(forClassName: string): CoderType | undefined {
    return this._classNameCoders.get(forClassName);
  }
}
