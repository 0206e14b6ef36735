import { sleepSeconds } from './sleep';

describe('sleepSeconds', () => {
  it('should wait at least the given time', async () => {
    // Arrange
    const startTime = Date.now();

    // Act
    await sleepSeconds(0.05);

    // Assert
    expect(Date.now() - startTime).toBeGreaterThanOrEqual(45);
  });

  it('should resolve immediately for zero or negative values', async () => {
    await expect(sleepSeconds(0)).resolves.toBeUndefined();
    await expect(sleepSeconds(-3)).resolves.toBeUndefined();
  });
});
