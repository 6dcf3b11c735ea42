import type { RuleView } from "@passgate/core";
import { Box, Text } from "ink";

interface RuleListProps {
  rules: RuleView[];
}

export function RuleList({ rules }: RuleListProps) {
  return (
    <Box flexDirection="column" marginY={1}>
      {rules.map((rule, index) => {
        if (rule.satisfied) {
          return (
            <Text key={rule.id} color="green">
              ✔ {index + 1}. {rule.message}
            </Text>
          );
        }
        if (rule.current) {
          return (
            <Text key={rule.id} color="red" bold>
              ✘ {index + 1}. {rule.message}
            </Text>
          );
        }
        return (
          <Text key={rule.id} dimColor>
            · {index + 1}. {rule.message}
          </Text>
        );
      })}
    </Box>
  );
}
