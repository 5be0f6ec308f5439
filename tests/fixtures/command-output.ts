// Captured-style output of external tools, with made-up values

export const OLLAMA_LIST_OUTPUT = [
  'NAME                    ID              SIZE      MODIFIED',
  'phi3:latest             a2c89ceaed85    2.3 GB    3 days ago',
  'llama3.1:latest         42182419e950    4.7 GB    2 weeks ago',
  'codellama:7b            8fdf8f752f6e    3.8 GB    5 weeks ago',
  '',
].join('\n');

export const OLLAMA_SHOW_OUTPUT = [
  '  Model',
  '    architecture        llama',
  '    parameters          8.0B',
  '    context length      131072',
  '',
  '  Parameters',
  '    stop    "<|eot_id|>"',
].join('\n');

export const PS_AUX_OUTPUT = [
  'USER         PID %CPU %MEM    VSZ   RSS TTY      STAT START   TIME COMMAND',
  'tester      1201  2.5  1.2 123456 65432 ?        Ssl  09:00   0:10 /usr/local/bin/ollama serve',
  'tester      1302 45.0 12.4 987654 456789 ?       Sl   09:05   3:02 /usr/local/bin/ollama runner --model /tmp/blob',
  'tester      1400  0.0  0.0   6000   900 pts/0    S+   09:10   0:00 grep ollama',
  'tester      1500  1.0  0.5  50000  2000 ?        S    09:11   0:01 /usr/bin/python3 app.py',
].join('\n');

export const MEMINFO_OUTPUT = [
  'MemTotal:       16318412 kB',
  'MemFree:         1234567 kB',
  'SwapTotal:       8388604 kB',
  'SwapFree:        8388604 kB',
].join('\n');

export const OS_RELEASE_OUTPUT = [
  'NAME="Ubuntu"',
  'VERSION="22.04.4 LTS (Jammy Jellyfish)"',
  'ID=ubuntu',
  'ID_LIKE=debian',
].join('\n');

export const LSCPU_OUTPUT = [
  'Architecture:            x86_64',
  '  CPU op-mode(s):        32-bit, 64-bit',
  'CPU(s):                  16',
  'Thread(s) per core:      2',
  'Core(s) per socket:      8',
].join('\n');

export const SYSTEM_PROFILER_OUTPUT = [
  'Graphics/Displays:',
  '',
  '    Apple M2 Pro:',
  '',
  '      Chipset Model: Apple M2 Pro',
  '      Type: GPU',
  '      Total Number of Cores: 19',
].join('\n');

export const ROCM_SMI_CSV_OUTPUT = [
  'device,Card series,Card model,Card vendor,Card SKU',
  'card0,Radeon RX 7900 XTX,0x744c,Advanced Micro Devices Inc. [AMD/ATI],D70701',
].join('\n');
