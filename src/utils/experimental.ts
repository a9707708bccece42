const warned = new Set<string>();

/**
 * 标记实验性功能使用情况，并提醒开发者谨慎依赖。
 */
export function warnExperimental(feature: string): void {
  if (warned.has(feature)) {
    return;
  }
  warned.add(feature);
  console.warn(`[TriStore][EXPERIMENTAL] 功能「${feature}」仍处于实验阶段，未来版本可能发生调整。`);
}
