import "reflect-metadata";
import { describe, it, expect } from "vitest";
import { Container, Injectable, Inject, createToken } from "../src/index";

// A small car assembly wired at a single composition root.

type EngineSpec = { type: string; horsepower: number };

const ENGINE_SPEC = createToken<EngineSpec>("EngineSpec");
const WHEEL_COUNT = createToken<number>("WheelCount");

abstract class Logger {
  abstract info(message: string): void;
}

class MemoryLogger extends Logger {
  readonly lines: string[] = [];

  info(message: string) {
    this.lines.push(`[INFO] ${message}`);
  }
}

@Injectable()
class Engine {
  constructor(
    @Inject(ENGINE_SPEC) private readonly spec: EngineSpec,
    private readonly logger: Logger,
  ) {}

  start() {
    this.logger.info(`Engine started: ${this.spec.type} with ${this.spec.horsepower} HP`);
  }
}

@Injectable()
class Wheels {
  constructor(@Inject(WHEEL_COUNT) public readonly count: number) {}
}

@Injectable()
class Car {
  constructor(
    public readonly engine: Engine,
    public readonly wheels: Wheels,
    private readonly logger: Logger,
  ) {}

  drive() {
    this.engine.start();
    this.logger.info(`${this.wheels.count} wheels rotating`);
  }
}

function composeGarage(logger: MemoryLogger): Container {
  const container = new Container({ name: "garage" });
  container.registerSingletonInstance(Logger, logger);
  container.register(ENGINE_SPEC, { useValue: { type: "V8", horsepower: 450 } });
  container.register(WHEEL_COUNT, { useValue: 4 });
  container.registerSingleton(Engine, Engine);
  container.registerTransient(Wheels, Wheels);
  container.registerTransient(Car, Car);
  return container;
}

describe("composition root", () => {
  it("should wire a full object graph from registrations", () => {
    // Arrange
    const logger = new MemoryLogger();
    const container = composeGarage(logger);
    container.validateDependencies();

    // Act
    container.getService(Car).drive();

    // Assert
    expect(logger.lines).toEqual([
      "[INFO] Engine started: V8 with 450 HP",
      "[INFO] 4 wheels rotating",
    ]);
  });

  it("should share singleton parts between transient cars", () => {
    // Arrange
    const container = composeGarage(new MemoryLogger());

    // Act
    const first = container.getService(Car);
    const second = container.getService(Car);

    // Assert
    expect(first).not.toBe(second);
    expect(first.engine).toBe(second.engine);
    expect(first.wheels).not.toBe(second.wheels);
  });

  it("should keep separate containers isolated", () => {
    // Arrange
    const garageA = composeGarage(new MemoryLogger());
    const garageB = composeGarage(new MemoryLogger());

    // Act
    const engineA = garageA.getService(Engine);
    const engineB = garageB.getService(Engine);

    // Assert
    expect(engineA).not.toBe(engineB);
  });
});
