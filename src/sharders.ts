import sha1 from 'sha1';

export abstract class Sharder {
  abstract getShard(input: string, totalShards: number): number;
}

export class SHA1Sharder extends Sharder {
  getShard(input: string, totalShards: number): number {
    const hashOutput = sha1(input);
    // take the last 4 bytes of the sha1 hex digest as a big-endian unsigned integer
    // (8 hex characters represent 4 bytes, e.g. 0xffffffff represents the max 4-byte integer)
    const intFromHash = parseInt(hashOutput.slice(-8), 16);
    return intFromHash % totalShards;
  }
}

export class DeterministicSharder extends Sharder {
  /*
  Deterministic sharding based on a look-up table
  to simplify writing tests
  */
  private lookup: Record<string, number>;

  constructor(lookup: Record<string, number>) {
    super();
    this.lookup = lookup;
  }

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  getShard(input: string, _totalShards: number): number {
    return this.lookup[input] ?? 0;
  }
}
