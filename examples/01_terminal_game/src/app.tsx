import type { ContentFilter, PasswordSession } from "@passgate/core";
import { Box, Text, useApp, useInput } from "ink";
import { useEffect } from "react";
import { PasswordField } from "./ui/password-field.js";
import { RuleList } from "./ui/rule-list.js";
import { StatusBanner } from "./ui/status-banner.js";
import { usePasswordGame } from "./use-password-game.js";

interface AppProps {
  session: PasswordSession;
  isDisallowed: ContentFilter;
}

export function App({ session, isDisallowed }: AppProps) {
  const { exit } = useApp();
  const { view, handleKey } = usePasswordGame(session, isDisallowed);

  useInput((input, key) => {
    handleKey({ input, ...key });
  });

  // Leave the final frame (celebration or game over) on screen.
  useEffect(() => {
    if (view.status !== "PLAYING") exit();
  }, [view.status, exit]);

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text bold>The Password Game</Text>
      <RuleList rules={view.rules} />
      <PasswordField text={view.text} status={view.status} />
      <StatusBanner view={view} />
    </Box>
  );
}
