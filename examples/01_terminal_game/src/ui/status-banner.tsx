import type { PlayerView } from "@passgate/core";
import { Box, Text } from "ink";

interface StatusBannerProps {
  view: PlayerView;
}

export function StatusBanner({ view }: StatusBannerProps) {
  if (view.status === "WON") {
    return (
      <Box flexDirection="column" marginTop={1}>
        <Text color="yellow" bold>
          🎉 {view.feedback}
        </Text>
        <Text>All {view.rules.length} rules satisfied. You win!</Text>
      </Box>
    );
  }

  if (view.status === "ENDED") {
    return (
      <Box marginTop={1}>
        <Text color="red" bold>
          {view.endReason === "profanity"
            ? "Inappropriate language detected! Game over."
            : "Game ended."}
        </Text>
      </Box>
    );
  }

  return (
    <Box marginTop={1}>
      <Text color={view.feedback ? "yellow" : undefined} dimColor={!view.feedback}>
        {view.feedback ??
          `${view.satisfiedIndices.length}/${view.rules.length} rules satisfied. Enter submits, Esc quits.`}
      </Text>
    </Box>
  );
}
