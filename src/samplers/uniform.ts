import random from "random";

type RandomStream = ReturnType<typeof random.clone>;

export class UniformSampler {
  private rng: RandomStream;

  constructor(seedString: string = "seed-string") {
    this.rng = random.clone(seedString);
  }

  // uniform in [0, 1)
  get(): number {
    return this.rng.float();
  }
}
