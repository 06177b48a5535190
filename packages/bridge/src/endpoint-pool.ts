/**
 * Round-robin choice among provider endpoints.
 */
export class EndpointPool {
  private readonly endpoints: readonly [string, ...string[]];
  private cursor = 0;

  constructor(endpoints: readonly string[]) {
    const [first, ...rest] = endpoints.map((e) => e.trim()).filter((e) => e !== "");
    if (first === undefined) {
      throw new Error("EndpointPool needs at least one endpoint");
    }
    this.endpoints = [first, ...rest];
  }

  get size(): number {
    return this.endpoints.length;
  }

  next(): string {
    const endpoint = this.endpoints[this.cursor] ?? this.endpoints[0];
    this.cursor = (this.cursor + 1) % this.endpoints.length;
    return endpoint;
  }
}
