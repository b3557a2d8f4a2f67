import { AssetClassDeviation, PortfolioSnapshot, TargetPolicy } from '../core/types';

const relative = (absolute: number, target: number): number | null => (target > 0 ? absolute / target : null);

/**
 * Actual minus target weight for every policy class and every held class. The
 * net track is what rules act on; the estimated track is reported for context.
 */
export const analyzeDeviation = (snapshot: PortfolioSnapshot, policy: TargetPolicy): AssetClassDeviation[] => {
  const classes = new Set<string>(Object.keys(policy.targets));
  for (const position of snapshot.positions) {
    if (position.sharesHeld !== 0) classes.add(position.assetClass);
  }

  return Array.from(classes)
    .sort()
    .map((assetClass) => {
      const targetWeight = policy.targets[assetClass] ?? 0;
      const actualWeightNet = snapshot.weightsNet[assetClass] ?? 0;
      const actualWeightEstimated = snapshot.weightsEstimated[assetClass] ?? 0;
      const absoluteDeviationNet = actualWeightNet - targetWeight;
      const absoluteDeviationEstimated = actualWeightEstimated - targetWeight;
      return {
        assetClass,
        targetWeight,
        actualWeightNet,
        actualWeightEstimated,
        absoluteDeviationNet,
        relativeDeviationNet: relative(absoluteDeviationNet, targetWeight),
        absoluteDeviationEstimated,
        relativeDeviationEstimated: relative(absoluteDeviationEstimated, targetWeight)
      };
    });
};
