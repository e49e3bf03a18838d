// tests/unit/matcher.test.ts - Requirement matcher ordering and determinism

import { describe, expect, test } from "vitest";
import { capabilityFromTemplate, requirementFrom } from "../../control/src/capability/model";
import {
  describeRejections,
  matchRequirement,
  rankCandidates,
  weightedSlack,
  type MatchCandidate,
  type MatchResult,
} from "../../control/src/capability/matcher";
import type { CapabilityDeclaration } from "../../control/src/capability/schema";

function live(label: string, declaration: CapabilityDeclaration): MatchCandidate<string> {
  return { kind: "live", label, capability: capabilityFromTemplate(declaration), item: label };
}

function provisionable(label: string, declaration: CapabilityDeclaration): MatchCandidate<string> {
  return { kind: "provisionable", label, capability: capabilityFromTemplate(declaration), item: label };
}

function selectedLabel(result: MatchResult<string>): string | undefined {
  return result.kind === "matched" ? result.selected.candidate.label : undefined;
}

describe("matchRequirement", () => {
  test("a live environment wins over a tighter provisionable template", () => {
    const pool = [provisionable("mock/small", { cores: 4 }), live("env-1", { cores: 16 })];
    expect(selectedLabel(matchRequirement(requirementFrom({ cores: 4 }), pool))).toBe("env-1");
  });

  test("least slack wins among candidates of the same kind", () => {
    const pool = [provisionable("mock/big", { cores: 16 }), provisionable("mock/small", { cores: 4 })];
    const result = matchRequirement(requirementFrom({ cores: 4 }), pool);
    expect(selectedLabel(result)).toBe("mock/small");
    expect(result.kind === "matched" ? result.selected.score : -1).toBe(0);
  });

  test("ties fall back to registration order", () => {
    const pool = [provisionable("mock/a", { cores: 8 }), provisionable("mock/b", { cores: 8 })];
    expect(selectedLabel(matchRequirement(requirementFrom({ cores: 4 }), pool))).toBe("mock/a");

    const reversed = [pool[1], pool[0]];
    expect(selectedLabel(matchRequirement(requirementFrom({ cores: 4 }), reversed))).toBe("mock/b");
  });

  test("unsatisfying candidates are never selected", () => {
    const pool = [live("env-1", { cores: 2 }), provisionable("mock/ok", { cores: 8 })];
    expect(selectedLabel(matchRequirement(requirementFrom({ cores: 4 }), pool))).toBe("mock/ok");
  });

  test("the slack metric is swappable", () => {
    const pool = [
      provisionable("mock/big", { cores: 16, features: [] }),
      provisionable("mock/extras", { cores: 4, features: ["a", "b"] }),
    ];
    const req = requirementFrom({ cores: 4, features: [] });
    // big: range 3; extras: 2 extra members
    expect(selectedLabel(matchRequirement(req, pool))).toBe("mock/extras");
    const ignoreRange = weightedSlack({ range: 0, extraMembers: 1, extraFlags: 1 });
    expect(selectedLabel(matchRequirement(req, pool, ignoreRange))).toBe("mock/big");
  });

  test("an open-ended range with a required flag picks the flagged template", () => {
    const requirement = requirementFrom({ cores: { min: 2 }, gpu: true });
    const gpu = provisionable("mock/gpu", { cores: 4, gpu: true });
    const cpu = provisionable("mock/cpu", { cores: 8, gpu: false });

    expect(selectedLabel(matchRequirement(requirement, [gpu, cpu]))).toBe("mock/gpu");
    expect(selectedLabel(matchRequirement(requirement, [cpu, gpu]))).toBe("mock/gpu");

    const result = matchRequirement(requirement, [cpu]);
    expect(result.kind === "no_candidate" ? describeRejections(result.rejections) : "").toBe("mock/cpu: gpu");
  });

  test("no candidate reports every rejection", () => {
    const pool = [provisionable("mock/a", { cores: 2, os: "linux" }), provisionable("mock/b", { cores: 8, os: "windows" })];
    const result = matchRequirement(requirementFrom({ cores: 4, os: "linux" }), pool);
    expect(result.kind).toBe("no_candidate");
    if (result.kind !== "no_candidate") return;
    expect(result.reason).toBe("CAPABILITY_MISMATCH");
    expect(result.rejections.map((r) => r.dimensions)).toEqual([["cores"], ["os"]]);
    expect(describeRejections(result.rejections)).toBe("mock/a: cores; mock/b: os");
  });

  test("empty pool", () => {
    const result = matchRequirement(requirementFrom({ cores: 1 }), []);
    expect(result.kind).toBe("no_candidate");
    if (result.kind !== "no_candidate") return;
    expect(describeRejections(result.rejections)).toBe("no candidates available");
  });
});

describe("rankCandidates", () => {
  test("identical pools rank identically", () => {
    const pool = [
      provisionable("mock/a", { cores: 8 }),
      live("env-2", { cores: 8 }),
      provisionable("mock/b", { cores: 4 }),
      live("env-1", { cores: 32 }),
      provisionable("mock/c", { cores: 4 }),
    ];
    const req = requirementFrom({ cores: 4 });
    const first = rankCandidates(req, pool).map((r) => r.candidate.label);
    const second = rankCandidates(req, [...pool]).map((r) => r.candidate.label);
    expect(first).toEqual(["env-2", "env-1", "mock/b", "mock/c", "mock/a"]);
    expect(second).toEqual(first);
  });
});
