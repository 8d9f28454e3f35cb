import { describe, it, expect } from '@jest/globals';
import {
  serviceFail,
  serviceOk,
  type NetworkProfile,
  type PeopleQuery,
  type ProfessionalNetworkService,
  type ServiceResult,
} from '../services/types.js';
import { createRolesStage, decisionMakerFacts } from './roles.js';
import { structureStage } from './structure.js';
import { ACME_PROFILE, ACME_ROLES, makeInvocation } from './__fixtures__/invocation.js';

async function upstream(): Promise<Record<string, unknown>> {
  const structure = await structureStage.run(
    makeInvocation({ results: { discovery: ACME_PROFILE } })
  );
  return { discovery: ACME_PROFILE, structure };
}

function network(
  reply: ServiceResult<NetworkProfile[]>
): ProfessionalNetworkService & { queries: PeopleQuery[] } {
  const queries: PeopleQuery[] = [];
  return {
    name: 'network',
    queries,
    findPeople: async (query) => {
      queries.push(query);
      return reply;
    },
  };
}

describe('roles stage', () => {
  it('scores people from the network provider, most senior first', async () => {
    const professionalNetwork = network(
      serviceOk([
        { name: 'Sam Poe', title: 'Sales Lead' },
        { name: 'Jane Doe', title: 'CEO', profileUrl: 'https://network.test/jane' },
        { name: ' ', title: 'CTO' },
      ])
    );
    const stage = createRolesStage({ services: { professionalNetwork } });

    const output = await stage.run(makeInvocation({ results: await upstream() }));

    expect(professionalNetwork.queries).toEqual([
      { company: 'Acme Corp', titles: ['SVP', 'VP Engineering', 'VP Sales', 'CTO'] },
    ]);
    expect(output.people).toEqual([
      {
        name: 'Jane Doe',
        title: 'CEO',
        profileUrl: 'https://network.test/jane',
        company: 'Acme Corp',
        decisionPower: 10,
        status: 'accepted',
        reason: 'Decision power: 10/10',
        source: 'network',
      },
      {
        name: 'Sam Poe',
        title: 'Sales Lead',
        company: 'Acme Corp',
        decisionPower: 4,
        status: 'rejected',
        reason: 'Decision power: 4/10',
        source: 'network',
      },
    ]);
    expect(output.acceptedCount).toBe(1);
    expect(output.rejectedCount).toBe(1);
    expect(output.summary).toBe('Found 1 decision-makers at Acme Corp');
  });

  it('suggests the operator roles when no provider is configured', async () => {
    const stage = createRolesStage({});
    const output = await stage.run(
      makeInvocation({ input: { roles: ['Head of Sales', 'Accountant'] }, results: await upstream() })
    );

    expect(output.people.map((person) => [person.title, person.status, person.source])).toEqual([
      ['Head of Sales', 'accepted', 'suggested'],
      ['Accountant', 'rejected', 'suggested'],
    ]);
    expect(output.people[0].name).toBeUndefined();
  });

  it('falls back to recommended targets when the provider fails', async () => {
    const professionalNetwork = network(serviceFail('rate limited', true));
    const stage = createRolesStage({ services: { professionalNetwork } });
    const invocation = makeInvocation({ results: await upstream() });

    const output = await stage.run(invocation);

    expect(output.people.map((person) => person.title)).toEqual([
      'SVP',
      'CTO',
      'VP Engineering',
      'VP Sales',
    ]);
    expect(invocation.logger.lines).toContain('warn: Roles: network lookup failed: rate limited');
  });
});

describe('decisionMakerFacts', () => {
  it('records accepted people only', () => {
    expect(decisionMakerFacts(ACME_ROLES)).toEqual([
      {
        key: 'decision_makers',
        kind: 'collection',
        value: ['Jane Doe (CEO)', 'John Roe (VP Sales)'],
        importance: 7,
      },
    ]);
  });

  it('records nothing without accepted people', () => {
    expect(decisionMakerFacts({ ...ACME_ROLES, people: [ACME_ROLES.people[2]] })).toEqual([]);
  });
});
