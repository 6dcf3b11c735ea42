import type { SessionStatus } from "@passgate/core";
import { Box, Text } from "ink";

interface PasswordFieldProps {
  text: string;
  status: SessionStatus;
}

export function PasswordField({ text, status }: PasswordFieldProps) {
  return (
    <Box borderStyle="round" paddingX={1}>
      <Text>
        Current password: {text}
        {status === "PLAYING" ? "▏" : ""}
      </Text>
    </Box>
  );
}
