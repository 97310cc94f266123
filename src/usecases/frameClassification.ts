export const DEFAULT_FRAMEWORK_PREFIXES: readonly string[] = [
  "java.",
  "javax.",
  "sun.",
  "com.sun.",
  "jdk.",
  "org.springframework.",
  "org.apache.",
  "org.hibernate.",
  "org.slf4j.",
  "ch.qos.logback.",
  "com.zaxxer.hikari.",
  "io.netty.",
  "reactor.",
  "com.fasterxml.jackson.",
];

export type FrameClassifier = {
  readonly prefixes: readonly string[];
  isFrameworkFrame(className: string | null | undefined): boolean;
};

export function createFrameClassifier(
  prefixes: readonly string[] = DEFAULT_FRAMEWORK_PREFIXES,
): FrameClassifier {
  const configured = prefixes.filter((prefix) => prefix.length > 0);

  return {
    prefixes: configured,
    isFrameworkFrame(className) {
      if (!className) return true;
      return configured.some((prefix) => className.startsWith(prefix));
    },
  };
}
