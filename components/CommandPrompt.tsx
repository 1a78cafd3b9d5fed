import React, { useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';

interface CommandPromptProps {
  onSubmit: (line: string) => void;
}

const CommandPrompt: React.FC<CommandPromptProps> = ({ onSubmit }) => {
  const [value, setValue] = useState('');

  const handleSubmit = (line: string) => {
    setValue('');
    onSubmit(line);
  };

  return (
    <Box>
      <Text color="blue">{'> '}</Text>
      <TextInput value={value} onChange={setValue} onSubmit={handleSubmit} placeholder="192.168.1.10/24" />
    </Box>
  );
};

export default CommandPrompt;
