import { DiContainer, IOnConstruct, IOnDispose, Lifestyles } from "../src";

(async () => {
  class User {
    public constructor(
      public readonly email: string,
      public readonly age: number
    ) {}
  }

  class Config {
    public dbProvider = "in_memory";
  }

  // Emulate a db storage
  const users: User[] = [];

  class DBContext implements IOnConstruct, IOnDispose {
    static inject = [Config];

    public constructor(private readonly _config: Config) {}

    onDispose(): Promise<void> | void {
      console.log("DBContext disposed");
    }

    onConstruct(): Promise<void> | void {
      console.log("DBContext constructed. Provider: ", this._config.dbProvider);
    }

    findUserByEmail(email: string): User | undefined {
      return users.find((user) => user.email === email);
    }

    addUser(user: User): void {
      users.push(user);
    }
  }

  class UserService {
    static inject = [DBContext];

    public constructor(private readonly _db: DBContext) {}

    public getUserByEmail(email: string): User | undefined {
      return this._db.findUserByEmail(email);
    }

    public addUser(user: User): void {
      this._db.addUser(user);
    }
  }

  const container = new DiContainer()
    .register(Config, Config, { lifestyle: Lifestyles.singleton })
    .register(DBContext, DBContext, { lifestyle: Lifestyles.scoped })
    .register(UserService, UserService, { lifestyle: Lifestyles.scoped });

  await container.verify();

  await container.runWithNewScope(async (scope) => {
    const userService = await scope.resolveRequired(UserService);
    userService.addUser(new User("john@example.com", 30));
    console.log(userService.getUserByEmail("john@example.com"));
  });

  // Outside of a scope the scoped service is unavailable
  await container.resolve(UserService).catch((err: unknown) => {
    console.log(err instanceof Error ? err.message : err);
  });
})();
