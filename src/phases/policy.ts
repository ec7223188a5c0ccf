import type { PassPolicy } from "./types.js";

export function policySatisfied(policy: PassPolicy, succeeded: number, total: number): boolean {
  switch (policy) {
    case "all":
      return succeeded === total;
    case "majority":
      return succeeded * 2 > total;
    case "any":
      return succeeded >= 1 || total === 0;
  }
}

export function describePolicy(policy: PassPolicy, total: number): string {
  switch (policy) {
    case "all":
      return `all ${total} required`;
    case "majority":
      return `majority (${Math.floor(total / 2) + 1} of ${total}) required`;
    case "any":
      return "at least one required";
  }
}
