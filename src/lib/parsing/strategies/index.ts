import type { RegionId } from '@/lib/duty/locations';
import { columnarStrategy } from '@/lib/parsing/strategies/columnar';
import { compositeTableStrategy } from '@/lib/parsing/strategies/compositeTable';
import { multiZoneStrategy } from '@/lib/parsing/strategies/multiZone';
import { simpleTableStrategy } from '@/lib/parsing/strategies/simpleTable';
import type { RegionStrategy } from '@/lib/parsing/types';

export const REGION_STRATEGIES: Record<RegionId, RegionStrategy> = {
  'segovia-capital': columnarStrategy,
  cuellar: compositeTableStrategy,
  'el-espinar': simpleTableStrategy,
  'segovia-rural': multiZoneStrategy,
};
