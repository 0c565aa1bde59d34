import { makeDocuments } from '../../test/testHelpers';
import { InvalidConfigurationError } from '../errors';
import { Document } from '../types';

import { CascadeEnvironment } from './cascade.environment';
import { hasOptimalRewardOracle, IClickModelEnvironment } from './click-model-environment';

describe('ClickModelEnvironment', () => {
  it('requires at least one document', () => {
    expect(() => new CascadeEnvironment([], 1)).toThrow(
      'Environment requires at least one document.',
    );
  });

  it('rejects duplicate document ids', () => {
    const documents = [new Document('a', 0.1), new Document('a', 0.2)];
    expect(() => new CascadeEnvironment(documents, 1)).toThrow(
      'Duplicate document id detected: a',
    );
  });

  it.each([0, 1.5, 4])('rejects slate size %p', (slateSize) => {
    expect(() => new CascadeEnvironment(makeDocuments({ a: 0.1, b: 0.2, c: 0.3 }), slateSize)).toThrow(
      InvalidConfigurationError,
    );
  });

  it('lists document ids in construction order', () => {
    const environment = new CascadeEnvironment(makeDocuments({ b: 0.1, a: 0.2 }), 1);
    expect(environment.docIds()).toEqual(['b', 'a']);
    expect(environment.model).toBe('cascade');
  });

  describe('hasOptimalRewardOracle', () => {
    const cascade = new CascadeEnvironment(makeDocuments({ a: 0.1, b: 0.2 }), 1, 1);

    it('detects the built-in environments', () => {
      expect(hasOptimalRewardOracle(cascade)).toBe(true);
    });

    it('rejects environments without the baseline methods', () => {
      const plain: IClickModelEnvironment = {
        model: 'cascade',
        slateSize: 1,
        docIds: () => cascade.docIds(),
        evaluate: (slate) => cascade.evaluate(slate),
      };
      expect(hasOptimalRewardOracle(plain)).toBe(false);
    });
  });
});
