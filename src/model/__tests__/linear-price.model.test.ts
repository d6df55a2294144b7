import { LinearPriceModel } from '../linear-price.model';

describe('LinearPriceModel', () => {
  const model = new LinearPriceModel({
    intercept: 120_000,
    coefficients: [15_500, 45_000, 60_000, 35_000, 0, 0, 0],
  });

  test('adds the weighted features to the intercept', async () => {
    // 120000 + 100*15500 + 2*45000 + 60000 + 35000
    await expect(model.predict([100, 2, 1, 1, 4, 3, 2])).resolves.toBe(1_855_000);
  });

  test('rejects a vector of the wrong length', async () => {
    await expect(model.predict([100, 2])).rejects.toThrow('Expected 7 features, got 2');
  });

  test('needs one coefficient per feature', () => {
    expect(() => new LinearPriceModel({ intercept: 0, coefficients: [1] })).toThrow(
      'Linear model needs 7 coefficients, got 1',
    );
  });
});
