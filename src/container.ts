type Factory<T> = () => T;

class Container {
  private factories = new Map<string, Factory<unknown>>();
  private instances = new Map<string, unknown>();

  register<T>(key: string, factory: Factory<T>): void {
    this.factories.set(key, factory);
  }

  resolve<T>(key: string): T {
    // Return cached instance if exists
    if (this.instances.has(key)) {
      return this.instances.get(key) as T;
    }

    const factory = this.factories.get(key);
    if (!factory) {
      throw new Error(`No factory registered for key: ${key}`);
    }

    const instance = factory() as T;
    this.instances.set(key, instance);
    return instance;
  }

  // For testing: clear all instances
  clearInstances(): void {
    this.instances.clear();
  }
}

export const container = new Container();

export const KEYS = {
  // Configuration
  CARD_CONFIG: 'cardConfig',

  // External sources
  STAT_SOURCE: 'statSource',

  // Services
  DISTRIBUTION_STORE: 'distributionStore',
  CARD_RENDERER: 'cardRenderer',
  CARD_SERVICE: 'cardService',
};
