import { describe, it, expect, afterEach, beforeAll, afterAll, beforeEach } from 'vitest';
import { singletons } from '../src/index.js';

class LazyService {
  /** Every call returns the same instance */
  static instance(): LazyService {
    return singletons.lazy(LazyService, () => new LazyService());
  }

  private constructor() {}

  doSomething(): string {
    return 'done';
  }
}

class Api {}

class EagerService {
  static instance(): EagerService {
    return singletons.get(EagerService);
  }

  /** Creates and registers the instance */
  static initialize(api: Api): EagerService {
    const service = new EagerService(api);
    singletons.registerValue(EagerService, service);
    return service;
  }

  private constructor(readonly api: Api) {}
}

class AppSettings {
  static load(): Promise<AppSettings> {
    return Promise.resolve(new AppSettings());
  }
}

class HttpClient {
  constructor(readonly settings: AppSettings) {}
}

class RemoteService {
  static instance(): RemoteService {
    return singletons.lookup(RemoteService).getInstance();
  }

  static async create(): Promise<RemoteService> {
    const settings = await singletons.lookup(AppSettings).awaitReady();
    return new RemoteService(new HttpClient(settings));
  }

  private constructor(readonly http: HttpClient) {}
}

describe('typical use cases', () => {
  describe('lazy service', () => {
    afterEach(() => {
      singletons.resetAllForTest();
    });

    it('creates an instance', () => {
      expect(LazyService.instance()).toBeInstanceOf(LazyService);
    });

    it('is a singleton', () => {
      expect(LazyService.instance()).toBe(LazyService.instance());
    });

    it('does something', () => {
      expect(LazyService.instance().doSomething()).toBe('done');
    });
  });

  describe('eager service', () => {
    const api = new Api();

    beforeAll(() => {
      EagerService.initialize(api);
    });

    afterAll(() => {
      singletons.resetAllForTest();
    });

    it('is a singleton', () => {
      expect(EagerService.instance()).toBe(EagerService.instance());
    });

    it('keeps its properties', () => {
      expect(EagerService.instance().api).toBe(api);
    });

    it('cannot be initialized twice', () => {
      expect(() => EagerService.initialize(new Api())).toThrow('Double registration for singleton EagerService');
    });
  });

  describe('promise-backed service', () => {
    beforeEach(async () => {
      singletons.registerValue(AppSettings, AppSettings.load());
      singletons.registerValue(RemoteService, RemoteService.create());

      await singletons.awaitReady([AppSettings, RemoteService]);
    });

    afterEach(() => {
      singletons.resetAllForTest();
    });

    it('is a singleton', () => {
      expect(RemoteService.instance()).toBe(RemoteService.instance());
    });

    it('is built from the other singletons', () => {
      expect(RemoteService.instance().http).toBeInstanceOf(HttpClient);
      expect(RemoteService.instance().http.settings).toBe(singletons.get(AppSettings));
    });
  });

  describe('after reset', () => {
    it('leaves no stale slot behind', () => {
      singletons.registerValue(Api, new Api());
      singletons.resetAllForTest();

      expect(singletons.has(Api)).toBe(false);
      expect(() => singletons.get(Api)).toThrow('Unknown singleton Api');
    });
  });
});
